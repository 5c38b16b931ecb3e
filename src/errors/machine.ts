import type { ErrorOptions } from "evlog";
import type { MachineErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class MachineError extends VmtopoError {
  readonly machine: string;

  constructor(code: MachineErrorCode, options: ErrorOptions & { machine: string }) {
    super(code, options);
    this.name = "MachineError";
    this.machine = options.machine;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), machine: this.machine };
  }
}

export const machineNotCreatedError = (machine: string): MachineError =>
  new MachineError("ERR_MACHINE_NOT_CREATED", {
    machine,
    message: `Machine "${machine}" has not been created`,
    fix: `Run 'vmtopo up ${machine}' first.`,
  });

export const machineNotRunningError = (machine: string, status: string): MachineError =>
  new MachineError("ERR_MACHINE_NOT_RUNNING", {
    machine,
    message: `Machine "${machine}" is not running (current status: ${status})`,
    fix: `Run 'vmtopo up ${machine}' to boot it.`,
  });
