import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { createVmtopo } from "../context.ts";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { loadTopology } from "../topology/loader.ts";
import { machineArgs } from "./args.ts";
import { machineNames, printReport, summarizeResult, withTopologyLock } from "./shared.ts";

const upCommand = defineCommand({
  meta: {
    name: "up",
    description: "Create, wire and provision the machines of a topology",
  },
  args: {
    ...machineArgs,
    provision: {
      type: "boolean",
      default: false,
      description: "Run provisioning steps even on machines that already completed them",
    },
    parallel: {
      type: "boolean",
      default: false,
      description: "Bring machines up concurrently",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("up");

    try {
      // Load and validate everything before the first hypervisor call.
      const topology = loadTopology(args.file);
      const machines = machineNames(args);
      const vmtopo = await createVmtopo();

      const report = await withTopologyLock(vmtopo.paths, topology, () =>
        vmtopo.up(topology, { machines, provision: args.provision, parallel: args.parallel }),
      );

      if (getOutputMode() !== "json") {
        printReport(report);
      }

      cmdLog.set({
        topology: topology.name,
        succeeded: report.succeeded,
        failed: report.failed,
        results: report.results.map(summarizeResult),
      });
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default upCommand as CommandDef;
