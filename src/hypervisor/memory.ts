import {
  imageNotFoundError,
  machineNotCreatedError,
  noBridgeError,
  noHostOnlyNetworkError,
} from "../errors/index.ts";
import { inSubnet } from "../lib/ipv4.ts";
import { parseCidr } from "../topology/validation.ts";
import {
  formatImage,
  type BaseImage,
  type MachineTarget,
  type NetworkAttachment,
} from "../topology/types.ts";
import type {
  CreateMachineParams,
  ExecResult,
  GuestCommand,
  Hypervisor,
  MachineHandle,
  MachineStatus,
} from "./types.ts";

export type HypervisorCall =
  | { op: "ensureImage"; vmName: string; image: string }
  | { op: "createMachine"; vmName: string; params: CreateMachineParams; created: boolean }
  | { op: "attachNetwork"; vmName: string; attachments: NetworkAttachment[] }
  | { op: "startMachine"; vmName: string }
  | { op: "configureGuestNetwork"; vmName: string; attachments: NetworkAttachment[] }
  | { op: "exec"; vmName: string; command: GuestCommand }
  | { op: "status"; vmName: string }
  | { op: "destroy"; vmName: string };

export interface MemoryMachine {
  vmName: string;
  image: string;
  memoryMb: number;
  cpuCount: number;
  status: MachineStatus;
  attachments: NetworkAttachment[];
  /** Scripts run in the guest, in order. */
  executed: string[];
}

export type ExecHandler = (
  target: MachineTarget,
  command: GuestCommand,
) => ExecResult | number | Promise<ExecResult | number>;

export interface MemoryHypervisorOptions {
  /** Available images as "box" or "box@version"; every image is available when omitted. */
  images?: string[];
  /** Bridgeable host interfaces; any bridge is accepted when omitted. */
  bridges?: string[];
  /** Host-only subnets in CIDR form; any private IP is accepted when omitted. */
  hostOnlySubnets?: string[];
  onExec?: ExecHandler;
}

/** In-process hypervisor that records every call. Backs `vmtopo plan` and tests. */
export class MemoryHypervisor implements Hypervisor {
  readonly name = "memory";
  readonly calls: HypervisorCall[] = [];
  private readonly machines = new Map<string, MemoryMachine>();

  constructor(private readonly options: MemoryHypervisorOptions = {}) {}

  machine(vmName: string): MemoryMachine | null {
    const machine = this.machines.get(vmName);
    return machine ? structuredClone(machine) : null;
  }

  execCount(vmName?: string): number {
    return this.calls.filter((call) => call.op === "exec" && (!vmName || call.vmName === vmName))
      .length;
  }

  private require(target: MachineTarget): MemoryMachine {
    const machine = this.machines.get(target.vmName);
    if (!machine) throw machineNotCreatedError(target.machine);
    return machine;
  }

  async ensureImage(target: MachineTarget, image: BaseImage): Promise<void> {
    const ref = formatImage(image);
    this.calls.push({ op: "ensureImage", vmName: target.vmName, image: ref });
    const { images } = this.options;
    if (images && !images.includes(ref) && !images.includes(image.box)) {
      throw imageNotFoundError(target.machine, ref);
    }
  }

  async createMachine(target: MachineTarget, params: CreateMachineParams): Promise<MachineHandle> {
    const existing = this.machines.get(target.vmName);
    this.calls.push({
      op: "createMachine",
      vmName: target.vmName,
      params: structuredClone(params),
      created: !existing,
    });

    if (existing) {
      if (existing.status !== "running") {
        existing.memoryMb = params.memoryMb;
        existing.cpuCount = params.cpuCount;
      }
      return { created: false };
    }

    this.machines.set(target.vmName, {
      vmName: target.vmName,
      image: formatImage(params.image),
      memoryMb: params.memoryMb,
      cpuCount: params.cpuCount,
      status: "poweroff",
      attachments: [],
      executed: [],
    });
    return { created: true };
  }

  async attachNetwork(target: MachineTarget, attachments: NetworkAttachment[]): Promise<void> {
    this.calls.push({
      op: "attachNetwork",
      vmName: target.vmName,
      attachments: structuredClone(attachments),
    });
    const machine = this.require(target);
    const { bridges, hostOnlySubnets } = this.options;

    for (const attachment of attachments) {
      if (attachment.kind === "private" && hostOnlySubnets) {
        const covered = hostOnlySubnets.some((subnet) => {
          const cidr = parseCidr(subnet);
          return inSubnet(attachment.ip, cidr.network, cidr.prefixLength);
        });
        if (!covered) throw noHostOnlyNetworkError(target.machine, attachment.ip);
      }
      if (attachment.kind === "bridged" && bridges) {
        const found = attachment.bridge === null ? bridges.length > 0 : bridges.includes(attachment.bridge);
        if (!found) throw noBridgeError(target.machine, attachment.bridge);
      }
    }

    machine.attachments = structuredClone(attachments);
  }

  async startMachine(target: MachineTarget): Promise<void> {
    this.calls.push({ op: "startMachine", vmName: target.vmName });
    this.require(target).status = "running";
  }

  async configureGuestNetwork(
    target: MachineTarget,
    attachments: NetworkAttachment[],
  ): Promise<void> {
    this.calls.push({
      op: "configureGuestNetwork",
      vmName: target.vmName,
      attachments: structuredClone(attachments),
    });
    this.require(target);
  }

  async exec(target: MachineTarget, command: GuestCommand): Promise<ExecResult> {
    this.calls.push({ op: "exec", vmName: target.vmName, command: { ...command } });
    const machine = this.require(target);

    const outcome = this.options.onExec ? await this.options.onExec(target, command) : 0;
    const result =
      typeof outcome === "number" ? { exitCode: outcome, stdout: "", stderr: "" } : outcome;
    if (result.exitCode === 0) machine.executed.push(command.script);
    return result;
  }

  async status(target: MachineTarget): Promise<MachineStatus> {
    this.calls.push({ op: "status", vmName: target.vmName });
    return this.machines.get(target.vmName)?.status ?? "not-created";
  }

  async destroy(target: MachineTarget): Promise<boolean> {
    this.calls.push({ op: "destroy", vmName: target.vmName });
    return this.machines.delete(target.vmName);
  }
}

function describeAttachment(attachment: NetworkAttachment): string {
  switch (attachment.kind) {
    case "private":
      return `private ${attachment.ip}/${attachment.prefixLength}`;
    case "bridged":
      return `bridged ${attachment.bridge ?? "auto"}`;
    case "forwarded-port":
      return `port ${attachment.hostPort}->${attachment.guestPort}/${attachment.protocol}`;
  }
}

/** One-line rendering of a recorded call, as printed by `vmtopo plan`. */
export function describeCall(call: HypervisorCall): string {
  switch (call.op) {
    case "ensureImage":
      return `${call.vmName}: ensure image ${call.image}`;
    case "createMachine":
      return `${call.vmName}: ${call.created ? "create" : "reuse"} (${call.params.memoryMb} MB, ${call.params.cpuCount} cpu)`;
    case "attachNetwork":
    case "configureGuestNetwork": {
      const verb = call.op === "attachNetwork" ? "attach" : "configure guest";
      const list = call.attachments.map(describeAttachment).join(", ");
      return `${call.vmName}: ${verb} ${list || "nat only"}`;
    }
    case "startMachine":
      return `${call.vmName}: start`;
    case "exec":
      return `${call.vmName}: run ${call.command.label}`;
    case "status":
      return `${call.vmName}: status`;
    case "destroy":
      return `${call.vmName}: destroy`;
  }
}
