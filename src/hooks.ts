import type { MachineRecord } from "./lib/render-state.ts";
import type { VmtopoError } from "./errors/index.ts";
import type { GuestCommand, ExecResult } from "./hypervisor/types.ts";
import type { MachineSpec, MachineTarget, NetworkAttachment } from "./topology/types.ts";

export type MachinePhase = "up" | "provision" | "destroy";

export interface VmtopoHooks {
  // Machine lifecycle
  "machine:beforeRender": (params: {
    topology: string;
    target: MachineTarget;
    spec: MachineSpec;
  }) => void | Promise<void>;
  "machine:afterRender": (record: MachineRecord) => void | Promise<void>;
  "machine:afterDestroy": (params: {
    topology: string;
    target: MachineTarget;
    removed: boolean;
  }) => void | Promise<void>;
  "machine:error": (params: {
    topology: string;
    target: MachineTarget;
    error: VmtopoError;
    phase: MachinePhase;
  }) => void | Promise<void>;

  // Network
  "network:afterAttach": (params: {
    target: MachineTarget;
    attachments: NetworkAttachment[];
  }) => void | Promise<void>;

  // Provisioning
  "provision:beforeStep": (params: {
    target: MachineTarget;
    stepIndex: number;
    command: GuestCommand;
  }) => void | Promise<void>;
  "provision:afterStep": (params: {
    target: MachineTarget;
    stepIndex: number;
    result: ExecResult;
  }) => void | Promise<void>;
}
