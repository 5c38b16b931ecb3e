import { consola, type ConsolaInstance } from "consola";

/**
 * What the library writes progress to. The CLI passes consola; embedders can
 * pass their own, or a silent one.
 */
export interface VmtopoLogger {
  debug: (message: string) => void;
  info: (message: string) => void;
  start: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Scoped logger, one per machine. */
  withTag: (tag: string) => VmtopoLogger;
}

export function fromConsola(instance: ConsolaInstance): VmtopoLogger {
  return {
    debug: (message) => instance.debug(message),
    info: (message) => instance.info(message),
    start: (message) => instance.start(message),
    success: (message) => instance.success(message),
    warn: (message) => instance.warn(message),
    error: (message) => instance.error(message),
    withTag: (tag) => fromConsola(instance.withTag(tag)),
  };
}

export function createDefaultLogger(): VmtopoLogger {
  return fromConsola(consola);
}

export function createSilentLogger(): VmtopoLogger {
  const ignore = (_message: string): void => {};
  const silent: VmtopoLogger = {
    debug: ignore,
    info: ignore,
    start: ignore,
    success: ignore,
    warn: ignore,
    error: ignore,
    withTag: () => silent,
  };
  return silent;
}
