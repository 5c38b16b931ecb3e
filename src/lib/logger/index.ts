import { consola } from "consola";
import { createRequestLogger, initLogger } from "evlog";
import type { RequestLogger } from "evlog";

export type OutputMode = "normal" | "json" | "verbose" | "silent";

let currentMode: OutputMode = "normal";

const SERVICE = "vmtopo";

/**
 * Sets up consola (what a person reads while machines come up) and evlog
 * (one wide event per command) for the chosen mode. Runs once, from the
 * root command's `setup`.
 */
export function initVmtopoLogger(mode: OutputMode): void {
  currentMode = mode;

  if (mode === "json" || mode === "silent") {
    consola.level = -999;
  } else if (mode === "verbose") {
    // debug lines carry every VBoxManage invocation
    consola.level = 4;
    consola.options.formatOptions = { ...consola.options.formatOptions, date: true };
  }

  initLogger({
    enabled: mode === "json" || mode === "verbose",
    pretty: mode === "verbose",
    stringify: mode === "json",
    env: { service: SERVICE },
  });
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

/** True when a confirmation prompt can be shown. */
export function canPrompt(): boolean {
  return currentMode === "normal" || currentMode === "verbose"
    ? process.stdin.isTTY === true
    : false;
}

export interface CommandLogger {
  set: RequestLogger["set"];
  error: RequestLogger["error"];
  /** Writes the wide event; a no-op outside json and verbose modes. */
  emit: () => void;
}

export function createCommandLogger(command: string): CommandLogger {
  const reqLog = createRequestLogger({ path: command });

  return {
    set: reqLog.set.bind(reqLog),
    error: reqLog.error.bind(reqLog),
    emit: () => {
      if (currentMode === "json" || currentMode === "verbose") {
        reqLog.emit();
      }
    },
  };
}
