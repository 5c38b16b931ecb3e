import type { MachineSpec, NetworkAttachment, Topology } from "./types.ts";
import { parseCidr } from "./validation.ts";

/** Host-only networks default to a /24 when the topology declares no subnet. */
export const DEFAULT_PRIVATE_PREFIX = 24;

/**
 * Network attachments for one machine, in the order the hypervisor applies
 * them: private, bridged, then forwarded ports exactly as configured.
 */
export function buildNetworkAttachments(
  topology: Topology,
  machine: MachineSpec,
): NetworkAttachment[] {
  const attachments: NetworkAttachment[] = [];

  if (machine.privateIp) {
    const prefixLength = topology.privateSubnet
      ? parseCidr(topology.privateSubnet).prefixLength
      : DEFAULT_PRIVATE_PREFIX;
    attachments.push({ kind: "private", ip: machine.privateIp, prefixLength });
  }

  if (machine.publicNetwork) {
    attachments.push({ kind: "bridged", bridge: machine.bridge });
  }

  for (const port of machine.forwardedPorts) {
    attachments.push({
      kind: "forwarded-port",
      guestPort: port.guestPort,
      hostPort: port.hostPort,
      protocol: port.protocol,
    });
  }

  return attachments;
}
