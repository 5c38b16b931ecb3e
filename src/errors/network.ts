import type { ErrorOptions } from "evlog";
import type { NetworkErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class NetworkBindError extends VmtopoError {
  readonly machine: string;
  readonly network: string;

  constructor(
    code: NetworkErrorCode,
    options: ErrorOptions & { machine: string; network: string },
  ) {
    super(code, options);
    this.name = "NetworkBindError";
    this.machine = options.machine;
    this.network = options.network;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), machine: this.machine, network: this.network };
  }
}

export const noHostOnlyNetworkError = (machine: string, ip: string): NetworkBindError =>
  new NetworkBindError("ERR_NETWORK_NO_HOSTONLY", {
    machine,
    network: ip,
    message: `No host-only network contains ${ip} (machine "${machine}")`,
    fix: "Create a host-only adapter whose subnet covers the private IP.",
  });

export const noBridgeError = (machine: string, bridge: string | null): NetworkBindError =>
  new NetworkBindError("ERR_NETWORK_NO_BRIDGE", {
    machine,
    network: bridge ?? "bridged",
    message: bridge
      ? `Bridge interface "${bridge}" not found (machine "${machine}")`
      : `No bridgeable host interface found (machine "${machine}")`,
  });

export const adapterBusyError = (machine: string, adapter: string): NetworkBindError =>
  new NetworkBindError("ERR_NETWORK_ADAPTER_BUSY", {
    machine,
    network: adapter,
    message: `Cannot rewire ${adapter} of machine "${machine}" while it is running`,
    fix: "Run 'vmtopo destroy' for the machine, then 'vmtopo up' again.",
  });

export const guestNetworkConfigError = (
  machine: string,
  ip: string,
  detail: string,
): NetworkBindError =>
  new NetworkBindError("ERR_NETWORK_GUEST_CONFIG", {
    machine,
    network: ip,
    message: `Could not assign ${ip} inside machine "${machine}": ${detail}`,
  });
