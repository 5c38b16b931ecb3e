import { parseDuration } from "./lib/utils.ts";

export interface HypervisorSettings {
  vboxManage: string;
  guestUser: string;
  guestPassword: string;
  bootTimeoutMs: number;
}

export const DEFAULT_SETTINGS: HypervisorSettings = {
  vboxManage: "VBoxManage",
  guestUser: "vagrant",
  guestPassword: "vagrant",
  bootTimeoutMs: 5 * 60 * 1000,
};

type Env = Record<string, string | undefined>;

/** Hypervisor settings from VMTOPO_* environment variables, falling back to defaults. */
export function resolveSettings(env: Env = process.env): HypervisorSettings {
  return {
    vboxManage: env.VMTOPO_VBOXMANAGE || DEFAULT_SETTINGS.vboxManage,
    guestUser: env.VMTOPO_GUEST_USER || DEFAULT_SETTINGS.guestUser,
    guestPassword: env.VMTOPO_GUEST_PASSWORD || DEFAULT_SETTINGS.guestPassword,
    bootTimeoutMs: env.VMTOPO_BOOT_TIMEOUT
      ? parseDuration(env.VMTOPO_BOOT_TIMEOUT)
      : DEFAULT_SETTINGS.bootTimeoutMs,
  };
}
