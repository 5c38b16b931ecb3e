import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { createVmtopo } from "../context.ts";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { loadTopology } from "../topology/loader.ts";
import { machineArgs } from "./args.ts";
import { machineNames, printReport, summarizeResult, withTopologyLock } from "./shared.ts";

const provisionCommand = defineCommand({
  meta: {
    name: "provision",
    description: "Re-run the provisioning steps on running machines",
  },
  args: machineArgs,
  async run({ args }) {
    const cmdLog = createCommandLogger("provision");

    try {
      const topology = loadTopology(args.file);
      const machines = machineNames(args);
      const vmtopo = await createVmtopo();

      const report = await withTopologyLock(vmtopo.paths, topology, () =>
        vmtopo.provision(topology, { machines }),
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

export default provisionCommand as CommandDef;
