export type ConfigErrorCode =
  | "ERR_CONFIG_NOT_FOUND"
  | "ERR_CONFIG_PARSE"
  | "ERR_CONFIG_INVALID"
  | "ERR_CONFIG_EMPTY"
  | "ERR_CONFIG_FIELD"
  | "ERR_CONFIG_INTEGER"
  | "ERR_CONFIG_IP"
  | "ERR_CONFIG_CIDR"
  | "ERR_CONFIG_SUBNET"
  | "ERR_CONFIG_PORT"
  | "ERR_CONFIG_IMAGE_REF"
  | "ERR_CONFIG_PROVIDER"
  | "ERR_CONFIG_DUPLICATE_NAME"
  | "ERR_CONFIG_DUPLICATE_IP"
  | "ERR_CONFIG_DUPLICATE_PORT"
  | "ERR_CONFIG_PROVISION_STEP"
  | "ERR_CONFIG_SCRIPT_NOT_FOUND"
  | "ERR_CONFIG_UNKNOWN_MACHINE";

export type ImageErrorCode = "ERR_IMAGE_NOT_FOUND";

export type NetworkErrorCode =
  | "ERR_NETWORK_NO_HOSTONLY"
  | "ERR_NETWORK_NO_BRIDGE"
  | "ERR_NETWORK_ADAPTER_BUSY"
  | "ERR_NETWORK_GUEST_CONFIG";

export type ProvisionErrorCode = "ERR_PROVISION_STEP_FAILED";

export type MachineErrorCode = "ERR_MACHINE_NOT_CREATED" | "ERR_MACHINE_NOT_RUNNING";

export type HypervisorErrorCode = "ERR_HYPERVISOR_COMMAND" | "ERR_HYPERVISOR_UNEXPECTED";

export type TimeoutErrorCode = "ERR_TIMEOUT_BOOT" | "ERR_TIMEOUT_LOCK";

export type SetupErrorCode = "ERR_SETUP_MISSING_BINARY";

export type VmtopoErrorCode =
  | ConfigErrorCode
  | ImageErrorCode
  | NetworkErrorCode
  | ProvisionErrorCode
  | MachineErrorCode
  | HypervisorErrorCode
  | TimeoutErrorCode
  | SetupErrorCode;
