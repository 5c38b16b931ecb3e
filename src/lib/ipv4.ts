const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/** Dotted quad with no leading zeros and every octet in 0-255. */
export function isIpv4(value: string): boolean {
  const match = IPV4_REGEX.exec(value);
  if (!match) return false;
  return match.slice(1).every((octet) => String(Number(octet)) === octet && Number(octet) <= 255);
}

export function ipToInt(ip: string): number {
  return ip.split(".").reduce((acc, octet) => ((acc << 8) | Number(octet)) >>> 0, 0);
}

export function prefixMask(prefixLength: number): number {
  return prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
}

export function maskToPrefix(mask: string): number {
  let bits = ipToInt(mask);
  let prefix = 0;
  while (bits & 0x80000000) {
    prefix++;
    bits = (bits << 1) >>> 0;
  }
  return prefix;
}

export function inSubnet(ip: string, network: string, prefixLength: number): boolean {
  const mask = prefixMask(prefixLength);
  return (ipToInt(ip) & mask) >>> 0 === (ipToInt(network) & mask) >>> 0;
}
