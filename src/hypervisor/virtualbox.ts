import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_SETTINGS, type HypervisorSettings } from "../settings.ts";
import { createSilentLogger, type VmtopoLogger } from "../vmtopo-logger.ts";
import { inSubnet, maskToPrefix } from "../lib/ipv4.ts";
import {
  adapterBusyError,
  bootTimeoutError,
  guestNetworkConfigError,
  hypervisorCommandError,
  imageNotFoundError,
  machineNotCreatedError,
  missingBinaryError,
  noBridgeError,
  noHostOnlyNetworkError,
} from "../errors/index.ts";
import {
  formatImage,
  type BaseImage,
  type ForwardedPort,
  type MachineTarget,
  type NetworkAttachment,
} from "../topology/types.ts";
import {
  MACHINE_STATUSES,
  type CreateMachineParams,
  type ExecResult,
  type GuestCommand,
  type Hypervisor,
  type MachineHandle,
  type MachineStatus,
} from "./types.ts";

export type CommandRunner = (file: string, args: string[]) => Promise<ExecResult>;

/** Runs a binary without a shell. Non-zero exits resolve; a missing binary rejects. */
export const execFileRunner: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: "utf8", maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const code: unknown = error.code;
        if (code === "ENOENT") {
          reject(missingBinaryError(file));
        } else if (typeof code === "number") {
          resolve({ exitCode: code, stdout, stderr });
        } else {
          reject(error);
        }
      },
    );
  });

// NIC1 stays NAT (port forwards live there); NIC2 is host-only, NIC3 bridged.
const PRIVATE_NIC = 2;
const BRIDGED_NIC = 3;

const GUEST_READY_PROPERTY = "/VirtualBox/GuestInfo/OS/LoggedInUsers";

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

/** Parses `showvminfo --machinereadable` output (`key="value"` lines). */
export function parseMachineReadable(output: string): Map<string, string> {
  const info = new Map<string, string>();
  for (const line of output.split("\n")) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const unquote = (value: string) => value.trim().replace(/^"(.*)"$/, "$1");
    info.set(unquote(line.slice(0, eq)), unquote(line.slice(eq + 1)));
  }
  return info;
}

/** Parses `list hostonlyifs` / `list bridgedifs` blocks of `Key: value` lines. */
export function parseInterfaceList(output: string): Record<string, string>[] {
  return output
    .split(/\n\s*\n/)
    .map((block) => {
      const entry: Record<string, string> = {};
      for (const line of block.split("\n")) {
        const colon = line.indexOf(":");
        if (colon <= 0) continue;
        entry[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
      }
      return entry;
    })
    .filter((entry) => entry.Name !== undefined);
}

function isMachineStatus(value: string): value is MachineStatus {
  return MACHINE_STATUSES.some((status) => status === value);
}

// ---------------------------------------------------------------------------
// Argument builders
// ---------------------------------------------------------------------------

export function applianceFileName(image: BaseImage): string {
  const box = image.box.replace(/\//g, "-");
  return image.version ? `${box}-${image.version}.ova` : `${box}.ova`;
}

export function importArgs(
  vmName: string,
  appliancePath: string,
  params: CreateMachineParams,
): string[] {
  return [
    "import",
    appliancePath,
    "--vsys",
    "0",
    "--vmname",
    vmName,
    "--memory",
    String(params.memoryMb),
    "--cpus",
    String(params.cpuCount),
  ];
}

export function sizingArgs(vmName: string, params: CreateMachineParams): string[] {
  return ["modifyvm", vmName, "--memory", String(params.memoryMb), "--cpus", String(params.cpuCount)];
}

const RULE_PREFIX = "vmtopo-";

export function portForwardRuleName(port: ForwardedPort): string {
  return `${RULE_PREFIX}${port.protocol}-${port.hostPort}`;
}

/** VirtualBox NAT rule: name,protocol,hostip,hostport,guestip,guestport. */
export function portForwardRule(port: ForwardedPort): string {
  return `${portForwardRuleName(port)},${port.protocol},,${port.hostPort},,${port.guestPort}`;
}

export function nicArgs(
  vmName: string,
  wiring: { hostOnlyAdapter: string | null; bridge: string | null },
): string[] | null {
  const args: string[] = [];
  if (wiring.hostOnlyAdapter) {
    args.push(
      `--nic${PRIVATE_NIC}`,
      "hostonly",
      `--hostonlyadapter${PRIVATE_NIC}`,
      wiring.hostOnlyAdapter,
    );
  }
  if (wiring.bridge) {
    args.push(`--nic${BRIDGED_NIC}`, "bridged", `--bridgeadapter${BRIDGED_NIC}`, wiring.bridge);
  }
  return args.length > 0 ? ["modifyvm", vmName, ...args] : null;
}

/** `controlvm` edits a running VM's NAT rules; `modifyvm` needs it powered off. */
export function natRuleArgs(vmName: string, rule: string, running: boolean): string[] {
  return running ? ["controlvm", vmName, "natpf1", rule] : ["modifyvm", vmName, "--natpf1", rule];
}

export function natRuleDeleteArgs(vmName: string, ruleName: string, running: boolean): string[] {
  return running
    ? ["controlvm", vmName, "natpf1", "delete", ruleName]
    : ["modifyvm", vmName, "--natpf1", "delete", ruleName];
}

export function guestRunArgs(
  vmName: string,
  credentials: { guestUser: string; guestPassword: string },
  script: string,
): string[] {
  return [
    "guestcontrol",
    vmName,
    "run",
    "--username",
    credentials.guestUser,
    "--password",
    credentials.guestPassword,
    "--exe",
    "/usr/bin/sudo",
    "--wait-stdout",
    "--wait-stderr",
    "--",
    "sudo",
    "-n",
    "/bin/sh",
    "-c",
    script,
  ];
}

/** Assigns the static private address to the guest's second interface. */
export function guestNetworkScript(ip: string, prefixLength: number): string {
  return [
    "set -e",
    "IFACE=$(ls /sys/class/net | grep -v '^lo$' | sort | sed -n 2p)",
    '[ -n "$IFACE" ] || { echo "no second network interface" >&2; exit 1; }',
    'ip addr flush dev "$IFACE"',
    `ip addr add ${ip}/${prefixLength} dev "$IFACE"`,
    'ip link set "$IFACE" up',
  ].join("\n");
}

function redact(args: string[]): string {
  return args
    .map((arg, i) => (args[i - 1] === "--password" ? "****" : arg))
    .join(" ");
}

// ---------------------------------------------------------------------------
// VirtualBoxHypervisor
// ---------------------------------------------------------------------------

export interface VirtualBoxOptions extends Partial<HypervisorSettings> {
  imagesDir: string;
  runner?: CommandRunner;
  logger?: VmtopoLogger;
}

export class VirtualBoxHypervisor implements Hypervisor {
  readonly name = "virtualbox";
  private readonly imagesDir: string;
  private readonly settings: HypervisorSettings;
  private readonly runner: CommandRunner;
  private readonly logger: VmtopoLogger;

  constructor(options: VirtualBoxOptions) {
    this.imagesDir = options.imagesDir;
    this.settings = {
      vboxManage: options.vboxManage ?? DEFAULT_SETTINGS.vboxManage,
      guestUser: options.guestUser ?? DEFAULT_SETTINGS.guestUser,
      guestPassword: options.guestPassword ?? DEFAULT_SETTINGS.guestPassword,
      bootTimeoutMs: options.bootTimeoutMs ?? DEFAULT_SETTINGS.bootTimeoutMs,
    };
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? createSilentLogger();
  }

  appliancePath(image: BaseImage): string {
    return join(this.imagesDir, applianceFileName(image));
  }

  private async tryRun(args: string[]): Promise<ExecResult> {
    this.logger.debug(`${this.settings.vboxManage} ${redact(args)}`);
    return this.runner(this.settings.vboxManage, args);
  }

  private async run(args: string[], target?: MachineTarget): Promise<string> {
    const result = await this.tryRun(args);
    if (result.exitCode !== 0) {
      throw hypervisorCommandError(
        `VBoxManage ${args[0]}`,
        result.exitCode,
        result.stderr,
        target?.machine,
      );
    }
    return result.stdout;
  }

  /** Machine-readable VM info, or null when no VM is registered under that name. */
  private async info(target: MachineTarget): Promise<Map<string, string> | null> {
    const result = await this.tryRun(["showvminfo", target.vmName, "--machinereadable"]);
    if (result.exitCode === 0) return parseMachineReadable(result.stdout);
    if (/could not find a registered machine|VBOX_E_OBJECT_NOT_FOUND/i.test(result.stderr)) {
      return null;
    }
    throw hypervisorCommandError("VBoxManage showvminfo", result.exitCode, result.stderr, target.machine);
  }

  private async requireInfo(target: MachineTarget): Promise<Map<string, string>> {
    const info = await this.info(target);
    if (!info) throw machineNotCreatedError(target.machine);
    return info;
  }

  async ensureImage(target: MachineTarget, image: BaseImage): Promise<void> {
    const path = this.appliancePath(image);
    if (!existsSync(path)) {
      throw imageNotFoundError(target.machine, formatImage(image), path);
    }
  }

  async createMachine(target: MachineTarget, params: CreateMachineParams): Promise<MachineHandle> {
    const info = await this.info(target);
    if (info) {
      if (info.get("VMState") === "running") {
        this.logger.debug(`${target.vmName} is running; keeping its current sizing`);
      } else {
        await this.run(sizingArgs(target.vmName, params), target);
      }
      return { created: false };
    }

    await this.run(importArgs(target.vmName, this.appliancePath(params.image), params), target);
    return { created: true };
  }

  private async findHostOnlyAdapter(target: MachineTarget, ip: string): Promise<string> {
    const adapters = parseInterfaceList(await this.run(["list", "hostonlyifs"], target));
    const match = adapters.find(
      (adapter) =>
        adapter.IPAddress !== undefined &&
        adapter.NetworkMask !== undefined &&
        inSubnet(ip, adapter.IPAddress, maskToPrefix(adapter.NetworkMask)),
    );
    if (!match) throw noHostOnlyNetworkError(target.machine, ip);
    return match.Name;
  }

  private async findBridge(target: MachineTarget, bridge: string | null): Promise<string> {
    const names = parseInterfaceList(await this.run(["list", "bridgedifs"], target)).map(
      (entry) => entry.Name,
    );
    const match = bridge === null ? names[0] : names.find((name) => name === bridge);
    if (!match) throw noBridgeError(target.machine, bridge);
    return match;
  }

  async attachNetwork(target: MachineTarget, attachments: NetworkAttachment[]): Promise<void> {
    const info = await this.requireInfo(target);
    const running = info.get("VMState") === "running";

    let hostOnlyAdapter: string | null = null;
    let bridge: string | null = null;
    const ports: ForwardedPort[] = [];

    for (const attachment of attachments) {
      switch (attachment.kind) {
        case "private":
          hostOnlyAdapter = await this.findHostOnlyAdapter(target, attachment.ip);
          break;
        case "bridged":
          bridge = await this.findBridge(target, attachment.bridge);
          break;
        case "forwarded-port":
          ports.push(attachment);
          break;
      }
    }

    if (running) {
      if (hostOnlyAdapter && info.get(`hostonlyadapter${PRIVATE_NIC}`) !== hostOnlyAdapter) {
        throw adapterBusyError(target.machine, `nic${PRIVATE_NIC}`);
      }
      if (bridge && info.get(`bridgeadapter${BRIDGED_NIC}`) !== bridge) {
        throw adapterBusyError(target.machine, `nic${BRIDGED_NIC}`);
      }
    } else {
      const args = nicArgs(target.vmName, { hostOnlyAdapter, bridge });
      if (args) await this.run(args, target);
    }

    const existingRules = new Map<string, string>();
    for (const [key, value] of info) {
      if (/^Forwarding\(\d+\)$/.test(key)) existingRules.set(value.split(",")[0], value);
    }

    // Rules this tool created for ports the topology no longer forwards.
    const wanted = new Set(ports.map(portForwardRuleName));
    for (const name of existingRules.keys()) {
      if (name.startsWith(RULE_PREFIX) && !wanted.has(name)) {
        await this.run(natRuleDeleteArgs(target.vmName, name, running), target);
      }
    }

    for (const port of ports) {
      const name = portForwardRuleName(port);
      const rule = portForwardRule(port);
      const existing = existingRules.get(name);
      if (existing === rule) continue;
      if (existing !== undefined) {
        await this.run(natRuleDeleteArgs(target.vmName, name, running), target);
      }
      await this.run(natRuleArgs(target.vmName, rule, running), target);
    }
  }

  async startMachine(target: MachineTarget): Promise<void> {
    const info = await this.requireInfo(target);
    if (info.get("VMState") === "running") return;

    await this.run(["startvm", target.vmName, "--type", "headless"], target);

    const timeoutMs = this.settings.bootTimeoutMs;
    const ready = await this.tryRun([
      "guestproperty",
      "wait",
      target.vmName,
      GUEST_READY_PROPERTY,
      "--timeout",
      String(timeoutMs),
      "--fail-on-timeout",
    ]);
    if (ready.exitCode !== 0) {
      throw bootTimeoutError(target.machine, timeoutMs);
    }
  }

  async configureGuestNetwork(
    target: MachineTarget,
    attachments: NetworkAttachment[],
  ): Promise<void> {
    for (const attachment of attachments) {
      if (attachment.kind !== "private") continue;
      const result = await this.exec(target, {
        label: "network",
        script: guestNetworkScript(attachment.ip, attachment.prefixLength),
      });
      if (result.exitCode !== 0) {
        throw guestNetworkConfigError(
          target.machine,
          attachment.ip,
          result.stderr.trim() || `exit code ${result.exitCode}`,
        );
      }
    }
  }

  async exec(target: MachineTarget, command: GuestCommand): Promise<ExecResult> {
    this.logger.debug(`Running ${command.label} on ${target.vmName}`);
    return this.tryRun(guestRunArgs(target.vmName, this.settings, command.script));
  }

  async status(target: MachineTarget): Promise<MachineStatus> {
    const info = await this.info(target);
    if (!info) return "not-created";
    const state = info.get("VMState") ?? "unknown";
    return isMachineStatus(state) ? state : "unknown";
  }

  async destroy(target: MachineTarget): Promise<boolean> {
    const info = await this.info(target);
    if (!info) return false;

    const state = info.get("VMState");
    if (state === "running" || state === "paused") {
      await this.run(["controlvm", target.vmName, "poweroff"], target);
    }
    await this.run(["unregistervm", target.vmName, "--delete"], target);
    return true;
  }
}
