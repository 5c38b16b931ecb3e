import type { MachineRecord, RenderStateStore } from "../lib/render-state.ts";

export class MemoryRenderStateStore implements RenderStateStore {
  private records = new Map<string, MachineRecord>();

  private key(topology: string, machine: string): string {
    return `${topology}/${machine}`;
  }

  save(record: MachineRecord): void {
    this.records.set(this.key(record.topology, record.machine), structuredClone(record));
  }

  load(topology: string, machine: string): MachineRecord | null {
    const record = this.records.get(this.key(topology, machine));
    return record ? structuredClone(record) : null;
  }

  list(topology: string): MachineRecord[] {
    return [...this.records.values()]
      .filter((r) => r.topology === topology)
      .sort((a, b) => a.machine.localeCompare(b.machine))
      .map((r) => structuredClone(r));
  }

  delete(topology: string, machine: string): void {
    this.records.delete(this.key(topology, machine));
  }
}
