import type { VmtopoContext } from "./context.ts";

export interface VmtopoPlugin {
  name: string;
  setup: (ctx: VmtopoContext) => void | Promise<void>;
}

export function definePlugin(plugin: VmtopoPlugin): VmtopoPlugin {
  return plugin;
}
