import { existsSync, readdirSync, readFileSync, rmSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import { mkdirSecure, writeSecure } from "./utils.ts";

export type RenderStatus = "rendered" | "error" | "destroyed";

/** Outcome of the last operation on one machine of one topology. */
export interface MachineRecord {
  topology: string;
  machine: string;
  vmName: string;
  status: RenderStatus;
  /** True once every provisioning step has succeeded at least once. */
  provisioned: boolean;
  stepsRun: number;
  failedStep: number | null;
  error: string | null;
  updatedAt: string;
}

export interface RenderStateStore {
  save(record: MachineRecord): void;
  load(topology: string, machine: string): MachineRecord | null;
  list(topology: string): MachineRecord[];
  delete(topology: string, machine: string): void;
}

export class FileRenderStateStore implements RenderStateStore {
  constructor(private readonly dir: string) {}

  private topologyDir(topology: string): string {
    return join(this.dir, topology);
  }

  private recordPath(topology: string, machine: string): string {
    return join(this.topologyDir(topology), `${machine}.json`);
  }

  save(record: MachineRecord): void {
    mkdirSecure(this.topologyDir(record.topology));
    writeSecure(this.recordPath(record.topology, record.machine), JSON.stringify(record, null, 2));
  }

  load(topology: string, machine: string): MachineRecord | null {
    const filePath = this.recordPath(topology, machine);
    if (!existsSync(filePath)) return null;
    return JSON.parse(readFileSync(filePath, "utf-8")) as MachineRecord;
  }

  list(topology: string): MachineRecord[] {
    const dir = this.topologyDir(topology);
    if (!existsSync(dir)) return [];
    return readdirSync(dir)
      .filter((f) => f.endsWith(".json"))
      .sort()
      .map((f) => JSON.parse(readFileSync(join(dir, f), "utf-8")) as MachineRecord);
  }

  delete(topology: string, machine: string): void {
    const filePath = this.recordPath(topology, machine);
    if (existsSync(filePath)) unlinkSync(filePath);
    const dir = this.topologyDir(topology);
    if (existsSync(dir) && readdirSync(dir).length === 0) {
      rmSync(dir, { recursive: true });
    }
  }
}
