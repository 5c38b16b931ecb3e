export const VALID_PROVIDERS = ["virtualbox"] as const;
export type Provider = (typeof VALID_PROVIDERS)[number];

export const VALID_PROTOCOLS = ["tcp", "udp"] as const;
export type PortProtocol = (typeof VALID_PROTOCOLS)[number];

export const DEFAULT_MEMORY_MB = 512;
export const DEFAULT_CPU_COUNT = 1;

export interface BaseImage {
  provider: Provider;
  box: string;
  version: string | null;
}

export interface ForwardedPort {
  guestPort: number;
  hostPort: number;
  protocol: PortProtocol;
}

export type ProvisionStep =
  | { kind: "inline"; script: string }
  /** Absolute path, resolved against the topology file's directory. */
  | { kind: "file"; path: string };

export interface MachineSpec {
  name: string;
  image: BaseImage;
  memoryMb: number;
  cpuCount: number;
  privateIp: string | null;
  publicNetwork: boolean;
  /** Host interface for the public network; null lets the hypervisor pick. */
  bridge: string | null;
  forwardedPorts: ForwardedPort[];
  provisionSteps: ProvisionStep[];
}

export interface Topology {
  name: string;
  provider: Provider;
  privateSubnet: string | null;
  machines: MachineSpec[];
  sourcePath: string | null;
}

export type NetworkAttachment =
  | { kind: "private"; ip: string; prefixLength: number }
  | { kind: "bridged"; bridge: string | null }
  | { kind: "forwarded-port"; guestPort: number; hostPort: number; protocol: PortProtocol };

/** Identifies a machine both by its topology name and by its hypervisor VM name. */
export interface MachineTarget {
  machine: string;
  vmName: string;
}

export function formatImage(image: BaseImage): string {
  return image.version ? `${image.box}@${image.version}` : image.box;
}
