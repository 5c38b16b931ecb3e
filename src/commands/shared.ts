import { join } from "node:path";
import { consola } from "consola";
import type { VmtopoPaths } from "../paths.ts";
import type { Topology } from "../topology/types.ts";
import type { MachineResult, RenderReport } from "../services/topology.ts";
import { ProvisionError } from "../errors/index.ts";
import { FileLock } from "../lib/file-lock.ts";
import { table } from "../lib/utils.ts";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const RESET = "\x1b[0m";

/** Positional machine names, de-duplicated, in the order given. */
export function machineNames(args: { machines?: string; _: string[] }): string[] {
  const raw = [args.machines, ...args._];
  return Array.from(
    new Set(raw.filter((name): name is string => typeof name === "string" && name !== "")),
  );
}

/** Serialize commands that mutate the same topology across processes. */
export function withTopologyLock<T>(
  paths: VmtopoPaths,
  topology: Topology,
  fn: () => Promise<T>,
): Promise<T> {
  return new FileLock(join(paths.locksDir, topology.name), `topology ${topology.name}`).runAsync(fn);
}

export function summarizeResult(result: MachineResult): Record<string, unknown> {
  return {
    machine: result.machine,
    vmName: result.vmName,
    success: result.success,
    created: result.created,
    provisioned: result.provisioned,
    stepsRun: result.stepsRun,
    error: result.error ? result.error.toJSON() : null,
  };
}

function errorColumn(result: MachineResult): string {
  if (!result.error) return "-";
  if (result.error instanceof ProvisionError) {
    return `${result.error.code} (step ${result.error.stepIndex})`;
  }
  return result.error.code;
}

export function renderReportTable(report: RenderReport): string {
  return table<MachineResult>({
    rows: report.results,
    columns: {
      MACHINE: { value: (r) => r.machine },
      RESULT: {
        value: (r) => (r.success ? "ok" : "failed"),
        color: (r) => (r.success ? `${GREEN}ok${RESET}` : `${RED}failed${RESET}`),
      },
      CREATED: { value: (r) => (r.created ? "yes" : "no") },
      PROVISIONED: { value: (r) => (r.provisioned ? "yes" : "no") },
      STEPS: { value: (r) => r.stepsRun },
      ERROR: { value: errorColumn },
    },
  });
}

export function printReport(report: RenderReport): void {
  consola.log(renderReportTable(report));
  for (const result of report.results) {
    if (result.error?.fix) {
      consola.withTag(result.machine).info(`Fix: ${result.error.fix}`);
    }
  }
}
