import type { ErrorOptions } from "evlog";
import type { HypervisorErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class HypervisorError extends VmtopoError {
  readonly machine?: string;
  readonly command?: string;
  readonly exitCode?: number;

  constructor(
    code: HypervisorErrorCode,
    options: ErrorOptions & { machine?: string; command?: string; exitCode?: number },
  ) {
    super(code, options);
    this.name = "HypervisorError";
    this.machine = options.machine;
    this.command = options.command;
    this.exitCode = options.exitCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.machine !== undefined && { machine: this.machine }),
      ...(this.command !== undefined && { command: this.command }),
      ...(this.exitCode !== undefined && { exitCode: this.exitCode }),
    };
  }
}

export const hypervisorCommandError = (
  command: string,
  exitCode: number,
  stderr: string,
  machine?: string,
): HypervisorError =>
  new HypervisorError("ERR_HYPERVISOR_COMMAND", {
    machine,
    command,
    exitCode,
    message: `${command} failed (exit code ${exitCode}): ${stderr.trim() || "no output"}`,
  });

export const unexpectedHypervisorError = (machine: string, cause: Error): HypervisorError =>
  new HypervisorError("ERR_HYPERVISOR_UNEXPECTED", {
    machine,
    message: `Rendering "${machine}" failed: ${cause.message}`,
    cause,
  });
