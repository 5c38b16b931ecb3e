import type { ErrorOptions } from "evlog";
import type { TimeoutErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class TimeoutError extends VmtopoError {
  readonly target?: string;
  readonly timeoutMs?: number;

  constructor(
    code: TimeoutErrorCode,
    options: ErrorOptions & { target?: string; timeoutMs?: number },
  ) {
    super(code, options);
    this.name = "TimeoutError";
    this.target = options.target;
    this.timeoutMs = options.timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.target !== undefined && { target: this.target }),
      ...(this.timeoutMs !== undefined && { timeoutMs: this.timeoutMs }),
    };
  }
}

export const bootTimeoutError = (machine: string, timeoutMs: number): TimeoutError =>
  new TimeoutError("ERR_TIMEOUT_BOOT", {
    target: machine,
    timeoutMs,
    message: `Machine "${machine}" did not report a ready guest after ${timeoutMs}ms`,
    fix: "Check that guest additions are installed in the base image, or raise VMTOPO_BOOT_TIMEOUT.",
  });

export const lockTimeoutError = (lockName: string): TimeoutError =>
  new TimeoutError("ERR_TIMEOUT_LOCK", {
    target: lockName,
    message: `Timed out waiting for ${lockName} lock`,
    why: "Another vmtopo command is working on the same topology.",
  });
