import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createVmtopo } from "../context.ts";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { table, timeAgo } from "../lib/utils.ts";
import { loadTopology } from "../topology/loader.ts";
import type { MachineStatusReport } from "../services/topology.ts";
import { machineArgs } from "./args.ts";
import { machineNames } from "./shared.ts";

const STATUS_COLORS: Record<string, string> = {
  running: "\x1b[36m", // cyan
  poweroff: "\x1b[2;90m", // dim gray
  saved: "\x1b[35m", // magenta
  aborted: "\x1b[31m", // red
  "not-created": "\x1b[2;90m",
};
const RESET = "\x1b[0m";

function colorStatus(status: string): string {
  const color = STATUS_COLORS[status] || "";
  return `${color}${status}${RESET}`;
}

const statusCommand = defineCommand({
  meta: {
    name: "status",
    description: "Show the hypervisor status and last render result of each machine",
  },
  args: machineArgs,
  async run({ args }) {
    const cmdLog = createCommandLogger("status");

    try {
      const topology = loadTopology(args.file);
      const vmtopo = await createVmtopo();
      const reports = await vmtopo.status(topology, { machines: machineNames(args) });

      const statuses: Record<string, number> = {};
      for (const report of reports) {
        statuses[report.status] = (statuses[report.status] ?? 0) + 1;
      }

      if (getOutputMode() === "json") {
        cmdLog.set({
          topology: topology.name,
          statuses,
          machines: reports.map((report) => ({
            machine: report.machine,
            vmName: report.vmName,
            status: report.status,
            lastRender: report.record?.status ?? null,
            provisioned: report.record?.provisioned ?? false,
            failedStep: report.record?.failedStep ?? null,
            updatedAt: report.record?.updatedAt ?? null,
          })),
        });
      } else {
        const output = table<MachineStatusReport>({
          rows: reports,
          columns: {
            MACHINE: { value: (r) => r.machine },
            VM: { value: (r) => r.vmName },
            STATUS: { value: (r) => r.status, color: (r) => colorStatus(r.status) },
            "LAST RENDER": { value: (r) => r.record?.status ?? "-" },
            PROVISIONED: { value: (r) => (r.record?.provisioned ? "yes" : "no") },
            UPDATED: { value: (r) => (r.record ? timeAgo(r.record.updatedAt) : "-") },
          },
        });
        consola.log(output);
        cmdLog.set({ topology: topology.name, statuses });
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default statusCommand as CommandDef;
