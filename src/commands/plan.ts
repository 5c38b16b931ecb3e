import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createVmtopo } from "../context.ts";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { loadTopology } from "../topology/loader.ts";
import { MemoryHypervisor, describeCall } from "../hypervisor/memory.ts";
import { MemoryRenderStateStore } from "../stores/memory.ts";
import { createSilentLogger } from "../vmtopo-logger.ts";
import { machineArgs } from "./args.ts";
import { machineNames } from "./shared.ts";

const planCommand = defineCommand({
  meta: {
    name: "plan",
    description: "Print the hypervisor calls 'up' would make, without making them",
  },
  args: machineArgs,
  async run({ args }) {
    const cmdLog = createCommandLogger("plan");

    try {
      const topology = loadTopology(args.file);
      const hypervisor = new MemoryHypervisor();
      const vmtopo = await createVmtopo({
        hypervisor,
        store: new MemoryRenderStateStore(),
        logger: createSilentLogger(),
      });

      await vmtopo.up(topology, { machines: machineNames(args), provision: true });

      const lines = hypervisor.calls.map(describeCall);
      if (getOutputMode() !== "json") {
        consola.log(lines.join("\n"));
      }
      cmdLog.set({ topology: topology.name, calls: lines });
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default planCommand as CommandDef;
