import type { BaseImage, MachineTarget, NetworkAttachment } from "../topology/types.ts";

export const MACHINE_STATUSES = [
  "running",
  "poweroff",
  "saved",
  "paused",
  "aborted",
  "not-created",
  "unknown",
] as const;
export type MachineStatus = (typeof MACHINE_STATUSES)[number];

export interface CreateMachineParams {
  image: BaseImage;
  memoryMb: number;
  cpuCount: number;
}

export interface MachineHandle {
  /** False when an existing VM was reused. */
  created: boolean;
}

export interface GuestCommand {
  /** Short description for logs, e.g. "inline" or the script path. */
  label: string;
  script: string;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * External virtualization control surface. Implementations only translate
 * these calls into the hypervisor's own commands; they keep no topology state.
 */
export interface Hypervisor {
  readonly name: string;
  ensureImage(target: MachineTarget, image: BaseImage): Promise<void>;
  createMachine(target: MachineTarget, params: CreateMachineParams): Promise<MachineHandle>;
  attachNetwork(target: MachineTarget, attachments: NetworkAttachment[]): Promise<void>;
  startMachine(target: MachineTarget): Promise<void>;
  configureGuestNetwork(target: MachineTarget, attachments: NetworkAttachment[]): Promise<void>;
  exec(target: MachineTarget, command: GuestCommand): Promise<ExecResult>;
  status(target: MachineTarget): Promise<MachineStatus>;
  /** Returns false when there was no VM to remove. */
  destroy(target: MachineTarget): Promise<boolean>;
}
