// Package entry point: the library surface behind the CLI.

export { createVmtopo } from "./context.ts";
export type { VmtopoContext, VmtopoOptions } from "./context.ts";
export type { VmtopoHooks, MachinePhase } from "./hooks.ts";
export { definePlugin } from "./plugin.ts";
export type { VmtopoPlugin } from "./plugin.ts";
export type { VmtopoLogger } from "./vmtopo-logger.ts";
export { createDefaultLogger, createSilentLogger, fromConsola } from "./vmtopo-logger.ts";

export { vmtopoPaths } from "./paths.ts";
export type { VmtopoPaths } from "./paths.ts";
export { resolveSettings, DEFAULT_SETTINGS } from "./settings.ts";
export type { HypervisorSettings } from "./settings.ts";

// Topology model and loading
export {
  VALID_PROVIDERS,
  VALID_PROTOCOLS,
  DEFAULT_MEMORY_MB,
  DEFAULT_CPU_COUNT,
  formatImage,
} from "./topology/types.ts";
export type {
  Provider,
  PortProtocol,
  BaseImage,
  ForwardedPort,
  ProvisionStep,
  MachineSpec,
  Topology,
  NetworkAttachment,
  MachineTarget,
} from "./topology/types.ts";
export {
  TOPOLOGY_FILENAMES,
  findTopologyFile,
  readTopologyFile,
  loadTopology,
  parseTopology,
  selectMachines,
  machineVmName,
} from "./topology/loader.ts";
export type { ParseTopologyOptions } from "./topology/loader.ts";
export {
  parseMachineName,
  parseMemoryMb,
  parseCpuCount,
  parsePort,
  parseProvider,
  parseIpv4,
  parseCidr,
  ipInSubnet,
  parseBaseImage,
  parseForwardedPorts,
  parseProvisionSteps,
} from "./topology/validation.ts";
export type { Cidr } from "./topology/validation.ts";
export { buildNetworkAttachments, DEFAULT_PRIVATE_PREFIX } from "./topology/attachments.ts";
export { toGuestCommand } from "./topology/steps.ts";

// Hypervisors
export { MACHINE_STATUSES } from "./hypervisor/types.ts";
export type {
  Hypervisor,
  MachineStatus,
  MachineHandle,
  CreateMachineParams,
  GuestCommand,
  ExecResult,
} from "./hypervisor/types.ts";
export { VirtualBoxHypervisor, execFileRunner } from "./hypervisor/virtualbox.ts";
export type { VirtualBoxOptions, CommandRunner } from "./hypervisor/virtualbox.ts";
export { MemoryHypervisor, describeCall } from "./hypervisor/memory.ts";
export type {
  MemoryHypervisorOptions,
  MemoryMachine,
  HypervisorCall,
  ExecHandler,
} from "./hypervisor/memory.ts";

// Rendering
export { TopologyService } from "./services/topology.ts";
export type {
  MachineSelection,
  UpOptions,
  MachineResult,
  RenderReport,
  MachineStatusReport,
  DestroyResult,
} from "./services/topology.ts";

export { FileRenderStateStore } from "./lib/render-state.ts";
export type { RenderStateStore, MachineRecord, RenderStatus } from "./lib/render-state.ts";
export { MemoryRenderStateStore } from "./stores/memory.ts";
export { FileLock } from "./lib/file-lock.ts";
export { parseDuration, timeAgo, mkdirSecure, writeSecure, table, toError } from "./lib/utils.ts";

// Errors
export * from "./errors/index.ts";

export {
  initVmtopoLogger,
  createCommandLogger,
  getOutputMode,
  canPrompt,
} from "./lib/logger/index.ts";
export type { OutputMode, CommandLogger } from "./lib/logger/index.ts";
