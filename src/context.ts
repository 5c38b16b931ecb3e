import { createHooks, type Hookable } from "hookable";
import { vmtopoPaths, type VmtopoPaths } from "./paths.ts";
import { FileRenderStateStore, type RenderStateStore } from "./lib/render-state.ts";
import type { VmtopoHooks } from "./hooks.ts";
import type { VmtopoPlugin } from "./plugin.ts";
import { createDefaultLogger, type VmtopoLogger } from "./vmtopo-logger.ts";
import type { Hypervisor } from "./hypervisor/types.ts";
import { VirtualBoxHypervisor } from "./hypervisor/virtualbox.ts";
import { resolveSettings } from "./settings.ts";
import { TopologyService } from "./services/topology.ts";

export interface VmtopoOptions {
  paths?: string | VmtopoPaths;
  store?: RenderStateStore;
  logger?: VmtopoLogger;
  hypervisor?: Hypervisor;
  plugins?: VmtopoPlugin[];
}

export interface VmtopoContext {
  readonly paths: VmtopoPaths;
  readonly store: RenderStateStore;
  readonly hooks: Hookable<VmtopoHooks>;
  readonly logger: VmtopoLogger;
  readonly hypervisor: Hypervisor;
}

export async function createVmtopo(options?: VmtopoOptions): Promise<TopologyService> {
  const paths =
    options?.paths === undefined
      ? vmtopoPaths()
      : typeof options.paths === "string"
        ? vmtopoPaths(options.paths)
        : options.paths;

  const store = options?.store ?? new FileRenderStateStore(paths.stateDir);
  const logger = options?.logger ?? createDefaultLogger();
  const hooks = createHooks<VmtopoHooks>();
  const hypervisor =
    options?.hypervisor ??
    new VirtualBoxHypervisor({
      imagesDir: paths.imagesDir,
      logger: logger.withTag("virtualbox"),
      ...resolveSettings(),
    });

  const ctx: VmtopoContext = { paths, store, hooks, logger, hypervisor };
  const service = new TopologyService(ctx);

  if (options?.plugins) {
    for (const plugin of options.plugins) {
      await plugin.setup(ctx);
    }
  }

  return service;
}
