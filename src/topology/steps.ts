import { existsSync, readFileSync, statSync } from "node:fs";
import { invalidProvisionStepError, provisionScriptNotFoundError } from "../errors/index.ts";
import type { GuestCommand } from "../hypervisor/types.ts";
import type { ProvisionStep } from "./types.ts";

/** Script files are read at run time, so edits are picked up by `vmtopo provision`. */
export function toGuestCommand(step: ProvisionStep, machine: string, stepIndex: number): GuestCommand {
  if (step.kind === "inline") {
    return { label: "inline", script: step.script };
  }
  if (!existsSync(step.path)) {
    throw provisionScriptNotFoundError(machine, stepIndex, step.path);
  }
  if (!statSync(step.path).isFile()) {
    throw invalidProvisionStepError(machine, stepIndex, `${step.path} is not a regular file`);
  }
  return { label: step.path, script: readFileSync(step.path, "utf-8") };
}
