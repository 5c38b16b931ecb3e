import type { ErrorOptions } from "evlog";
import type { ConfigErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class ConfigError extends VmtopoError {
  readonly machine?: string;
  readonly field?: string;
  readonly stepIndex?: number;

  constructor(
    code: ConfigErrorCode,
    options: ErrorOptions & { machine?: string; field?: string; stepIndex?: number },
  ) {
    super(code, options);
    this.name = "ConfigError";
    this.machine = options.machine;
    this.field = options.field;
    this.stepIndex = options.stepIndex;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.machine !== undefined && { machine: this.machine }),
      ...(this.field !== undefined && { field: this.field }),
      ...(this.stepIndex !== undefined && { stepIndex: this.stepIndex }),
    };
  }
}

const where = (machine?: string): string => (machine ? ` (machine "${machine}")` : "");

export const topologyFileNotFoundError = (location: string): ConfigError =>
  new ConfigError("ERR_CONFIG_NOT_FOUND", {
    message: `No topology file found at ${location}`,
    fix: "Create a vmtopo.yaml in the project directory or pass --file <path>.",
  });

export const topologyParseError = (path: string, detail: string): ConfigError =>
  new ConfigError("ERR_CONFIG_PARSE", {
    message: `Could not parse topology file ${path}: ${detail}`,
  });

export const invalidTopologyError = (detail: string): ConfigError =>
  new ConfigError("ERR_CONFIG_INVALID", {
    message: `Invalid topology: ${detail}`,
  });

export const emptyTopologyError = (): ConfigError =>
  new ConfigError("ERR_CONFIG_EMPTY", {
    field: "machines",
    message: "Topology defines no machines.",
    fix: "Add at least one entry under `machines`.",
  });

export const invalidFieldError = (
  field: string,
  value: unknown,
  expected: string,
  machine?: string,
): ConfigError =>
  new ConfigError("ERR_CONFIG_FIELD", {
    machine,
    field,
    message: `Invalid ${field}${where(machine)}: ${JSON.stringify(value)}. Expected ${expected}.`,
  });

export const invalidIntegerFieldError = (
  field: string,
  value: unknown,
  min: number,
  max: number,
  machine?: string,
  unitSuffix: string = "",
): ConfigError =>
  new ConfigError("ERR_CONFIG_INTEGER", {
    machine,
    field,
    message: `Invalid ${field}${where(machine)}: ${JSON.stringify(value)}. Must be an integer between ${min} and ${max}${unitSuffix}.`,
  });

export const invalidIpv4Error = (value: unknown, machine?: string): ConfigError =>
  new ConfigError("ERR_CONFIG_IP", {
    machine,
    field: "ip",
    message: `Invalid IPv4 address${where(machine)}: ${JSON.stringify(value)}`,
  });

export const invalidCidrError = (value: string): ConfigError =>
  new ConfigError("ERR_CONFIG_CIDR", {
    field: "network.privateSubnet",
    message: `Invalid CIDR: "${value}". Expected format: x.x.x.x/y with a prefix of 0-32.`,
  });

export const ipOutsideSubnetError = (machine: string, ip: string, subnet: string): ConfigError =>
  new ConfigError("ERR_CONFIG_SUBNET", {
    machine,
    field: "ip",
    message: `Private IP ${ip} of machine "${machine}" is outside the private subnet ${subnet}`,
    fix: `Pick an address inside ${subnet} or change network.privateSubnet.`,
  });

export const invalidPortError = (value: unknown, machine?: string): ConfigError =>
  new ConfigError("ERR_CONFIG_PORT", {
    machine,
    field: "ports",
    message: `Invalid forwarded port${where(machine)}: ${JSON.stringify(value)}`,
    fix: 'Use { guest: 80, host: 8080 } or "8080:80".',
  });

export const invalidImageRefError = (value: unknown, machine?: string): ConfigError =>
  new ConfigError("ERR_CONFIG_IMAGE_REF", {
    machine,
    field: "image",
    message: `Invalid image${where(machine)}: ${JSON.stringify(value)}. Expected "<box>" or "<box>@<version>".`,
  });

export const invalidProviderError = (
  provider: unknown,
  validProviders: readonly string[],
): ConfigError =>
  new ConfigError("ERR_CONFIG_PROVIDER", {
    field: "provider",
    message: `Invalid provider: ${JSON.stringify(provider)}. Must be one of: ${validProviders.join(", ")}`,
  });

export const duplicateMachineNameError = (name: string): ConfigError =>
  new ConfigError("ERR_CONFIG_DUPLICATE_NAME", {
    machine: name,
    field: "name",
    message: `Machine name "${name}" is defined more than once`,
    why: "Machine names identify VMs and must be unique within a topology.",
  });

export const duplicatePrivateIpError = (ip: string, first: string, second: string): ConfigError =>
  new ConfigError("ERR_CONFIG_DUPLICATE_IP", {
    machine: second,
    field: "ip",
    message: `Private IP ${ip} is assigned to both "${first}" and "${second}"`,
  });

export const duplicateHostPortError = (
  hostPort: number,
  protocol: string,
  first: string,
  second: string,
): ConfigError =>
  new ConfigError("ERR_CONFIG_DUPLICATE_PORT", {
    machine: second,
    field: "ports",
    message: `Host port ${hostPort}/${protocol} is forwarded by both "${first}" and "${second}"`,
  });

export const invalidProvisionStepError = (
  machine: string,
  stepIndex: number,
  detail: string,
): ConfigError =>
  new ConfigError("ERR_CONFIG_PROVISION_STEP", {
    machine,
    stepIndex,
    field: "provision",
    message: `Invalid provisioning step ${stepIndex} of machine "${machine}": ${detail}`,
  });

export const provisionScriptNotFoundError = (
  machine: string,
  stepIndex: number,
  path: string,
): ConfigError =>
  new ConfigError("ERR_CONFIG_SCRIPT_NOT_FOUND", {
    machine,
    stepIndex,
    field: "provision",
    message: `Provisioning script not found for step ${stepIndex} of machine "${machine}": ${path}`,
    fix: "Script paths are resolved relative to the topology file.",
  });

export const unknownMachineError = (name: string, known: readonly string[]): ConfigError =>
  new ConfigError("ERR_CONFIG_UNKNOWN_MACHINE", {
    machine: name,
    message: `Unknown machine: ${name}`,
    fix: `Defined machines: ${known.join(", ")}`,
  });

export const invalidDurationError = (input: string): ConfigError =>
  new ConfigError("ERR_CONFIG_FIELD", {
    field: "VMTOPO_BOOT_TIMEOUT",
    message: `Invalid duration: "${input}". Use format like "5m", "90s", "1h30m", or plain minutes.`,
  });
