import type { SetupErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class SetupError extends VmtopoError {
  constructor(code: SetupErrorCode, options: { message: string; fix?: string }) {
    super(code, options);
    this.name = "SetupError";
  }
}

export const missingBinaryError = (binary: string): SetupError =>
  new SetupError("ERR_SETUP_MISSING_BINARY", {
    message: `${binary} not found`,
    fix: "Install VirtualBox, or point VMTOPO_VBOXMANAGE at the VBoxManage binary.",
  });
