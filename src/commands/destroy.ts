import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createVmtopo } from "../context.ts";
import { canPrompt, createCommandLogger } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { loadTopology, selectMachines } from "../topology/loader.ts";
import { machineArgs } from "./args.ts";
import { machineNames, withTopologyLock } from "./shared.ts";

const destroyCommand = defineCommand({
  meta: {
    name: "destroy",
    description: "Power off and delete the machines of a topology",
  },
  args: {
    ...machineArgs,
    force: {
      type: "boolean",
      default: false,
      description: "Skip the confirmation prompt",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("destroy");

    try {
      const topology = loadTopology(args.file);
      const machines = machineNames(args);
      const targets = selectMachines(topology, machines).map((m) => m.name);

      if (!args.force) {
        if (!canPrompt()) {
          consola.error("Refusing to destroy without --force in non-interactive mode.");
          cmdLog.set({ topology: topology.name, aborted: true });
          cmdLog.emit();
          process.exitCode = 1;
          return;
        }
        const confirmed = await consola.prompt(`Destroy ${targets.join(", ")}?`, {
          type: "confirm",
          initial: false,
        });
        if (confirmed !== true) {
          consola.info("Aborted.");
          cmdLog.set({ topology: topology.name, aborted: true });
          cmdLog.emit();
          return;
        }
      }

      const vmtopo = await createVmtopo();
      const results = await withTopologyLock(vmtopo.paths, topology, () =>
        vmtopo.destroy(topology, { machines }),
      );

      const failed = results.filter((r) => !r.success);
      cmdLog.set({
        topology: topology.name,
        results: results.map((r) => ({
          machine: r.machine,
          success: r.success,
          removed: r.removed,
          error: r.error ? r.error.toJSON() : null,
        })),
      });
      if (failed.length > 0) {
        process.exitCode = 1;
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default destroyCommand as CommandDef;
