import type { ErrorOptions } from "evlog";
import type { ProvisionErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class ProvisionError extends VmtopoError {
  readonly machine: string;
  readonly stepIndex: number;
  readonly exitCode: number;

  constructor(
    code: ProvisionErrorCode,
    options: ErrorOptions & { machine: string; stepIndex: number; exitCode: number },
  ) {
    super(code, options);
    this.name = "ProvisionError";
    this.machine = options.machine;
    this.stepIndex = options.stepIndex;
    this.exitCode = options.exitCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      machine: this.machine,
      stepIndex: this.stepIndex,
      exitCode: this.exitCode,
    };
  }
}

export const provisionStepFailedError = (
  machine: string,
  stepIndex: number,
  exitCode: number,
  stderr: string,
): ProvisionError => {
  const tail = stderr.trim().split("\n").slice(-5).join("\n");
  return new ProvisionError("ERR_PROVISION_STEP_FAILED", {
    machine,
    stepIndex,
    exitCode,
    message: `Provisioning step ${stepIndex} failed on "${machine}" (exit code ${exitCode})`,
    ...(tail !== "" && { why: tail }),
    fix: `Fix the step and run 'vmtopo provision ${machine}'.`,
  });
};
