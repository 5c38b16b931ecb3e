import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { table } from "../lib/utils.ts";
import { loadTopology } from "../topology/loader.ts";
import { formatImage, type MachineSpec } from "../topology/types.ts";
import { topologyArgs } from "./args.ts";

function formatPorts(machine: MachineSpec): string {
  if (machine.forwardedPorts.length === 0) return "-";
  return machine.forwardedPorts
    .map((p) => `${p.hostPort}->${p.guestPort}${p.protocol === "tcp" ? "" : `/${p.protocol}`}`)
    .join(",");
}

const validateCommand = defineCommand({
  meta: {
    name: "validate",
    description: "Load and validate a topology file without touching the hypervisor",
  },
  args: topologyArgs,
  async run({ args }) {
    const cmdLog = createCommandLogger("validate");

    try {
      const topology = loadTopology(args.file);

      if (getOutputMode() === "json") {
        cmdLog.set({ topology });
      } else {
        consola.success(
          `${topology.sourcePath ?? topology.name}: ${topology.machines.length} machine(s), provider ${topology.provider}`,
        );
        const output = table<MachineSpec>({
          rows: topology.machines,
          columns: {
            NAME: { value: (m) => m.name },
            IMAGE: { value: (m) => formatImage(m.image) },
            MEMORY: { value: (m) => `${m.memoryMb} MB` },
            CPUS: { value: (m) => m.cpuCount },
            IP: { value: (m) => m.privateIp ?? "-" },
            PUBLIC: { value: (m) => (m.publicNetwork ? (m.bridge ?? "yes") : "no") },
            PORTS: { value: formatPorts },
            STEPS: { value: (m) => m.provisionSteps.length },
          },
        });
        consola.log(output);
        cmdLog.set({ topology: topology.name, machines: topology.machines.length });
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default validateCommand as CommandDef;
