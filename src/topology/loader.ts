import { existsSync, readFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import {
  duplicateHostPortError,
  duplicateMachineNameError,
  duplicatePrivateIpError,
  emptyTopologyError,
  invalidFieldError,
  invalidTopologyError,
  ipOutsideSubnetError,
  topologyFileNotFoundError,
  topologyParseError,
  unknownMachineError,
} from "../errors/index.ts";
import type { MachineSpec, Provider, ProvisionStep, Topology } from "./types.ts";
import {
  ipInSubnet,
  isRecord,
  parseBaseImage,
  parseBoolean,
  parseCidr,
  parseCpuCount,
  parseForwardedPorts,
  parseIpv4,
  parseMachineName,
  parseMemoryMb,
  parseOptionalString,
  parseProvider,
  parseProvisionSteps,
  type Cidr,
} from "./validation.ts";

export const TOPOLOGY_FILENAMES = ["vmtopo.yaml", "vmtopo.yml", "vmtopo.json"] as const;

/**
 * Look for a topology file in `cwd`, then in each parent directory.
 * Returns null when none is found before the filesystem root.
 */
export function findTopologyFile(cwd: string = process.cwd()): string | null {
  let dir = resolve(cwd);
  while (true) {
    for (const filename of TOPOLOGY_FILENAMES) {
      const candidate = join(dir, filename);
      if (existsSync(candidate)) return candidate;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

export function readTopologyFile(path: string): Topology {
  const sourcePath = resolve(path);
  if (!existsSync(sourcePath)) {
    throw topologyFileNotFoundError(sourcePath);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(sourcePath, "utf-8"));
  } catch (error) {
    throw topologyParseError(sourcePath, error instanceof Error ? error.message : String(error));
  }

  return parseTopology(raw, { baseDir: dirname(sourcePath), sourcePath });
}

/** Resolve `--file` if given, otherwise search upwards from the working directory. */
export function loadTopology(file?: string, cwd: string = process.cwd()): Topology {
  if (file) return readTopologyFile(resolve(cwd, file));
  const found = findTopologyFile(cwd);
  if (!found) {
    throw topologyFileNotFoundError(`${resolve(cwd)} or any parent directory`);
  }
  return readTopologyFile(found);
}

export interface ParseTopologyOptions {
  /** Directory that relative script paths resolve against. */
  baseDir: string;
  sourcePath?: string | null;
}

interface MachineDefaults {
  image: unknown;
  memoryMb: number | undefined;
  cpuCount: number | undefined;
  provisionSteps: ProvisionStep[];
}

function parseDefaults(value: unknown, baseDir: string): MachineDefaults {
  if (value === undefined || value === null) {
    return { image: undefined, memoryMb: undefined, cpuCount: undefined, provisionSteps: [] };
  }
  if (!isRecord(value)) {
    throw invalidFieldError("defaults", value, "a mapping");
  }
  return {
    image: value.image,
    memoryMb: value.memory === undefined ? undefined : parseMemoryMb(value.memory, "defaults"),
    cpuCount: value.cpus === undefined ? undefined : parseCpuCount(value.cpus, "defaults"),
    provisionSteps: parseProvisionSteps(value.provision, "defaults", baseDir),
  };
}

function parseMachine(
  value: unknown,
  index: number,
  provider: Provider,
  defaults: MachineDefaults,
  baseDir: string,
): MachineSpec {
  if (!isRecord(value)) {
    throw invalidFieldError(`machines[${index}]`, value, "a mapping");
  }

  const name = parseMachineName(value.name, `machines[${index}].name`);
  const image = value.image ?? defaults.image;
  if (image === undefined) {
    throw invalidFieldError("image", image, "a base image (set it here or under defaults)", name);
  }

  return {
    name,
    image: parseBaseImage(image, provider, name),
    memoryMb: parseMemoryMb(value.memory, name, defaults.memoryMb),
    cpuCount: parseCpuCount(value.cpus, name, defaults.cpuCount),
    privateIp: value.ip === undefined || value.ip === null ? null : parseIpv4(value.ip, name),
    publicNetwork: parseBoolean("public", value.public, false, name),
    bridge: parseOptionalString("bridge", value.bridge, name),
    forwardedPorts: parseForwardedPorts(value.ports, name),
    provisionSteps: [
      ...defaults.provisionSteps,
      ...parseProvisionSteps(value.provision, name, baseDir, defaults.provisionSteps.length),
    ],
  };
}

function assertUnique(machines: MachineSpec[], subnet: Cidr | null, subnetText: string): void {
  const names = new Set<string>();
  const ips = new Map<string, string>();
  const hostPorts = new Map<string, string>();

  for (const machine of machines) {
    if (names.has(machine.name)) {
      throw duplicateMachineNameError(machine.name);
    }
    names.add(machine.name);

    if (machine.privateIp) {
      const owner = ips.get(machine.privateIp);
      if (owner) {
        throw duplicatePrivateIpError(machine.privateIp, owner, machine.name);
      }
      ips.set(machine.privateIp, machine.name);

      if (subnet && !ipInSubnet(machine.privateIp, subnet)) {
        throw ipOutsideSubnetError(machine.name, machine.privateIp, subnetText);
      }
    }

    for (const port of machine.forwardedPorts) {
      const key = `${port.hostPort}/${port.protocol}`;
      const owner = hostPorts.get(key);
      if (owner) {
        throw duplicateHostPortError(port.hostPort, port.protocol, owner, machine.name);
      }
      hostPorts.set(key, machine.name);
    }
  }
}

const FALLBACK_TOPOLOGY_NAME = "topology";

/** Directory name folded into a lowercase label; "topology" when nothing usable is left. */
export function defaultTopologyName(baseDir: string): string {
  const label = basename(resolve(baseDir))
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .slice(0, 63)
    .replace(/^-+|-+$/g, "");
  return label === "" ? FALLBACK_TOPOLOGY_NAME : parseMachineName(label, "name");
}

/**
 * Validate a parsed topology document. Every check runs here, so a topology
 * that loads never fails validation later at hypervisor-call time.
 */
export function parseTopology(raw: unknown, options: ParseTopologyOptions): Topology {
  if (!isRecord(raw)) {
    throw invalidTopologyError("the document must be a mapping with a `machines` list");
  }

  const name =
    raw.name === undefined
      ? defaultTopologyName(options.baseDir)
      : parseMachineName(raw.name, "name");
  const provider = parseProvider(raw.provider);

  let privateSubnet: string | null = null;
  let subnet: Cidr | null = null;
  const network = raw.network;
  if (network !== undefined && network !== null) {
    if (!isRecord(network)) {
      throw invalidFieldError("network", network, "a mapping");
    }
    if (network.privateSubnet !== undefined) {
      subnet = parseCidr(network.privateSubnet);
      privateSubnet = `${subnet.network}/${subnet.prefixLength}`;
    }
  }

  const entries = raw.machines;
  if (entries === undefined || entries === null) {
    throw emptyTopologyError();
  }
  if (!Array.isArray(entries)) {
    throw invalidFieldError("machines", entries, "a list of machines");
  }
  if (entries.length === 0) {
    throw emptyTopologyError();
  }

  const defaults = parseDefaults(raw.defaults, options.baseDir);
  const machines = entries.map((entry: unknown, index: number) =>
    parseMachine(entry, index, provider, defaults, options.baseDir),
  );

  assertUnique(machines, subnet, privateSubnet ?? "");

  return {
    name,
    provider,
    privateSubnet,
    machines,
    sourcePath: options.sourcePath ?? null,
  };
}

/** All machines when `names` is empty; otherwise the named ones, in topology order. */
export function selectMachines(topology: Topology, names: readonly string[] = []): MachineSpec[] {
  if (names.length === 0) return topology.machines;

  const known = topology.machines.map((machine) => machine.name);
  for (const name of names) {
    if (!known.includes(name)) throw unknownMachineError(name, known);
  }
  return topology.machines.filter((machine) => names.includes(machine.name));
}

export function machineVmName(topology: Topology, machine: MachineSpec): string {
  return `${topology.name}_${machine.name}`;
}
