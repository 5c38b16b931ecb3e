export type {
  VmtopoErrorCode,
  ConfigErrorCode,
  ImageErrorCode,
  NetworkErrorCode,
  ProvisionErrorCode,
  MachineErrorCode,
  HypervisorErrorCode,
  TimeoutErrorCode,
  SetupErrorCode,
} from "./codes.ts";

export { VmtopoError } from "./base.ts";

export { ConfigError } from "./config.ts";
export {
  topologyFileNotFoundError,
  topologyParseError,
  invalidTopologyError,
  emptyTopologyError,
  invalidFieldError,
  invalidIntegerFieldError,
  invalidIpv4Error,
  invalidCidrError,
  ipOutsideSubnetError,
  invalidPortError,
  invalidImageRefError,
  invalidProviderError,
  duplicateMachineNameError,
  duplicatePrivateIpError,
  duplicateHostPortError,
  invalidProvisionStepError,
  provisionScriptNotFoundError,
  unknownMachineError,
  invalidDurationError,
} from "./config.ts";

export { ImageNotFoundError, imageNotFoundError } from "./image.ts";

export { NetworkBindError } from "./network.ts";
export {
  noHostOnlyNetworkError,
  noBridgeError,
  adapterBusyError,
  guestNetworkConfigError,
} from "./network.ts";

export { ProvisionError, provisionStepFailedError } from "./provision.ts";

export { MachineError, machineNotCreatedError, machineNotRunningError } from "./machine.ts";

export {
  HypervisorError,
  hypervisorCommandError,
  unexpectedHypervisorError,
} from "./hypervisor.ts";

export { TimeoutError, bootTimeoutError, lockTimeoutError } from "./timeout.ts";

export { SetupError, missingBinaryError } from "./setup.ts";

export { handleCommandError, formatError } from "./display.ts";
