import { EvlogError, type ErrorOptions } from "evlog";
import type { VmtopoErrorCode } from "./codes.ts";

export class VmtopoError extends EvlogError {
  readonly code: VmtopoErrorCode;

  constructor(code: VmtopoErrorCode, options: ErrorOptions) {
    super(options);
    this.name = "VmtopoError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}
