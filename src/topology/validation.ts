import { existsSync, statSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { inSubnet, isIpv4 } from "../lib/ipv4.ts";
import {
  invalidCidrError,
  invalidFieldError,
  invalidImageRefError,
  invalidIntegerFieldError,
  invalidIpv4Error,
  invalidPortError,
  invalidProviderError,
  invalidProvisionStepError,
  provisionScriptNotFoundError,
} from "../errors/index.ts";
import {
  DEFAULT_CPU_COUNT,
  DEFAULT_MEMORY_MB,
  VALID_PROTOCOLS,
  VALID_PROVIDERS,
  type BaseImage,
  type ForwardedPort,
  type PortProtocol,
  type Provider,
  type ProvisionStep,
} from "./types.ts";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProvider(value: unknown): value is Provider {
  return VALID_PROVIDERS.some((provider) => provider === value);
}

function isProtocol(value: unknown): value is PortProtocol {
  return VALID_PROTOCOLS.some((protocol) => protocol === value);
}

function parseIntegerField(
  field: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  machine?: string,
  unitSuffix: string = "",
): number {
  if (value === undefined || value === null) return fallback;
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw invalidIntegerFieldError(field, value, min, max, machine, unitSuffix);
  }
  return parsed;
}

export function parseMemoryMb(
  value: unknown,
  machine?: string,
  fallback: number = DEFAULT_MEMORY_MB,
): number {
  return parseIntegerField("memory", value, fallback, 128, 65536, machine, " MB");
}

export function parseCpuCount(
  value: unknown,
  machine?: string,
  fallback: number = DEFAULT_CPU_COUNT,
): number {
  return parseIntegerField("cpus", value, fallback, 1, 64, machine);
}

export function parsePort(value: unknown, machine?: string): number {
  const parsed = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw invalidPortError(value, machine);
  }
  return parsed;
}

const MACHINE_NAME_REGEX = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export function parseMachineName(value: unknown, field: string = "name"): string {
  if (typeof value !== "string" || !MACHINE_NAME_REGEX.test(value)) {
    throw invalidFieldError(
      field,
      value,
      "lowercase letters, digits and inner hyphens, at most 63 characters",
    );
  }
  return value;
}

export function parseProvider(value: unknown): Provider {
  if (value === undefined || value === null) return "virtualbox";
  if (!isProvider(value)) {
    throw invalidProviderError(value, VALID_PROVIDERS);
  }
  return value;
}

export function parseIpv4(value: unknown, machine?: string): string {
  if (typeof value !== "string" || !isIpv4(value.trim())) {
    throw invalidIpv4Error(value, machine);
  }
  return value.trim();
}

export interface Cidr {
  network: string;
  prefixLength: number;
}

export function parseCidr(value: unknown): Cidr {
  const raw = typeof value === "string" ? value.trim() : String(value);
  const [network, prefix, ...rest] = raw.split("/");
  const prefixLength = Number(prefix);
  if (
    rest.length > 0 ||
    !isIpv4(network) ||
    !/^\d{1,2}$/.test(prefix ?? "") ||
    prefixLength < 0 ||
    prefixLength > 32
  ) {
    throw invalidCidrError(raw);
  }
  return { network, prefixLength };
}

export function ipInSubnet(ip: string, cidr: Cidr): boolean {
  return inSubnet(ip, cidr.network, cidr.prefixLength);
}

const BOX_REGEX = /^[\w.-]+(?:\/[\w.-]+)?$/;

export function parseBaseImage(value: unknown, provider: Provider, machine?: string): BaseImage {
  if (typeof value !== "string") {
    throw invalidImageRefError(value, machine);
  }
  const trimmed = value.trim();
  const at = trimmed.lastIndexOf("@");
  const box = at === -1 ? trimmed : trimmed.slice(0, at);
  const version = at === -1 ? null : trimmed.slice(at + 1);

  if (!BOX_REGEX.test(box) || version === "") {
    throw invalidImageRefError(value, machine);
  }
  return { provider, box, version };
}

const PORT_STRING_REGEX = /^(\d+):(\d+)(?:\/(\w+))?$/;

function parseProtocol(value: unknown, entry: unknown, machine: string): PortProtocol {
  if (value === undefined || value === null) return "tcp";
  if (!isProtocol(value)) {
    throw invalidPortError(entry, machine);
  }
  return value;
}

/** Entries are `{ guest, host, protocol? }` objects or `"host:guest[/protocol]"` strings. */
export function parseForwardedPorts(value: unknown, machine: string): ForwardedPort[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw invalidFieldError("ports", value, "a list of forwarded ports", machine);
  }

  return value.map((entry: unknown) => {
    if (typeof entry === "string") {
      const match = PORT_STRING_REGEX.exec(entry.trim());
      if (!match) throw invalidPortError(entry, machine);
      return {
        hostPort: parsePort(match[1], machine),
        guestPort: parsePort(match[2], machine),
        protocol: parseProtocol(match[3], entry, machine),
      };
    }
    if (isRecord(entry)) {
      return {
        guestPort: parsePort(entry.guest, machine),
        hostPort: parsePort(entry.host, machine),
        protocol: parseProtocol(entry.protocol, entry, machine),
      };
    }
    throw invalidPortError(entry, machine);
  });
}

export function parseBoolean(
  field: string,
  value: unknown,
  fallback: boolean,
  machine?: string,
): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw invalidFieldError(field, value, "true or false", machine);
  }
  return value;
}

export function parseOptionalString(field: string, value: unknown, machine?: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string" || value.trim() === "") {
    throw invalidFieldError(field, value, "a non-empty string", machine);
  }
  return value.trim();
}

function resolveScriptPath(path: string, baseDir: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Steps are shell strings, `{ inline }` or `{ path }` entries. Step indexes in
 * errors start at `offset`, so steps inherited from defaults keep their place.
 */
export function parseProvisionSteps(
  value: unknown,
  machine: string,
  baseDir: string,
  offset: number = 0,
): ProvisionStep[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw invalidFieldError("provision", value, "a list of provisioning steps", machine);
  }

  return value.map((entry: unknown, i): ProvisionStep => {
    const stepIndex = offset + i;

    if (typeof entry === "string") {
      if (entry.trim() === "") {
        throw invalidProvisionStepError(machine, stepIndex, "command is empty");
      }
      return { kind: "inline", script: entry };
    }

    if (isRecord(entry)) {
      if ("inline" in entry && "path" in entry) {
        throw invalidProvisionStepError(machine, stepIndex, "use either inline or path, not both");
      }
      if (typeof entry.inline === "string" && entry.inline.trim() !== "") {
        return { kind: "inline", script: entry.inline };
      }
      if (typeof entry.path === "string" && entry.path.trim() !== "") {
        const path = resolveScriptPath(entry.path.trim(), baseDir);
        if (!existsSync(path)) {
          throw provisionScriptNotFoundError(machine, stepIndex, path);
        }
        if (!statSync(path).isFile()) {
          throw invalidProvisionStepError(machine, stepIndex, `${path} is not a regular file`);
        }
        return { kind: "file", path };
      }
    }

    throw invalidProvisionStepError(
      machine,
      stepIndex,
      "expected a shell command, { inline: <script> } or { path: <file> }",
    );
  });
}
