import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stripAnsi } from "consola/utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseDuration, table, timeAgo } from "../../src/lib/utils.ts";
import { inSubnet, isIpv4, maskToPrefix } from "../../src/lib/ipv4.ts";
import { DEFAULT_SETTINGS, resolveSettings } from "../../src/settings.ts";
import { vmtopoPaths } from "../../src/paths.ts";
import { FileLock } from "../../src/lib/file-lock.ts";
import { machineNames } from "../../src/commands/shared.ts";
import { ConfigError } from "../../src/errors/index.ts";

describe("parseDuration", () => {
  it("reads plain numbers as minutes", () => {
    expect(parseDuration("5")).toBe(300_000);
  });

  it("sums units", () => {
    expect(parseDuration("1h30m")).toBe(5_400_000);
    expect(parseDuration("90s")).toBe(90_000);
  });

  it("rejects text without units", () => {
    expect(() => parseDuration("soon")).toThrow(ConfigError);
  });
});

describe("timeAgo", () => {
  const now = Date.parse("2026-03-01T12:00:00.000Z");

  it("formats recent and older dates", () => {
    expect(timeAgo("2026-03-01T11:59:50.000Z", now)).toBe("just now");
    expect(timeAgo("2026-03-01T11:58:00.000Z", now)).toBe("2 minutes ago");
    expect(timeAgo("2026-02-28T12:00:00.000Z", now)).toBe("1 day ago");
  });
});

describe("table", () => {
  it("pads columns to the widest visible value", () => {
    const output = table({
      rows: [
        { name: "web01", steps: 2 },
        { name: "db", steps: 10 },
      ],
      columns: {
        NAME: { value: (r) => r.name },
        STEPS: { value: (r) => r.steps, color: (r) => `\x1b[31m${r.steps}\x1b[0m` },
      },
    });

    expect(stripAnsi(output).split("\n")).toEqual([
      "NAME    STEPS",
      "web01   2    ",
      "db      10   ",
    ]);
  });
});

describe("ipv4", () => {
  it("validates dotted quads", () => {
    expect(isIpv4("10.0.0.1")).toBe(true);
    expect(isIpv4("10.0.0.01")).toBe(false);
    expect(isIpv4("10.0.0")).toBe(false);
  });

  it("converts netmasks to prefixes", () => {
    expect(maskToPrefix("255.255.255.0")).toBe(24);
    expect(maskToPrefix("255.255.240.0")).toBe(20);
    expect(maskToPrefix("0.0.0.0")).toBe(0);
  });

  it("checks subnet membership", () => {
    expect(inSubnet("192.168.56.77", "192.168.56.1", 24)).toBe(true);
    expect(inSubnet("192.168.57.77", "192.168.56.1", 24)).toBe(false);
  });
});

describe("resolveSettings", () => {
  it("falls back to defaults", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("reads VMTOPO_* variables", () => {
    expect(
      resolveSettings({
        VMTOPO_VBOXMANAGE: "/usr/local/bin/VBoxManage",
        VMTOPO_GUEST_USER: "ops",
        VMTOPO_GUEST_PASSWORD: "test-secret",
        VMTOPO_BOOT_TIMEOUT: "90s",
      }),
    ).toEqual({
      vboxManage: "/usr/local/bin/VBoxManage",
      guestUser: "ops",
      guestPassword: "test-secret",
      bootTimeoutMs: 90_000,
    });
  });
});

describe("vmtopoPaths", () => {
  it("lays out directories under the base", () => {
    expect(vmtopoPaths("/srv/vmtopo")).toEqual({
      baseDir: "/srv/vmtopo",
      stateDir: "/srv/vmtopo/state",
      imagesDir: "/srv/vmtopo/images",
      locksDir: "/srv/vmtopo/locks",
    });
  });
});

describe("machineNames", () => {
  it("merges the positional and the rest, without duplicates", () => {
    expect(machineNames({ machines: "web01", _: ["web01", "db01"] })).toEqual(["web01", "db01"]);
    expect(machineNames({ _: [] })).toEqual([]);
  });
});

describe("FileLock", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vmtopo-lock-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("serializes work on the same path", async () => {
    const path = join(dir, "locks", "lab");
    const order: string[] = [];
    const task = (name: string) =>
      new FileLock(path, "topology lab").runAsync(async () => {
        order.push(`${name} start`);
        await new Promise((r) => setTimeout(r, 30));
        order.push(`${name} end`);
      });

    await Promise.all([task("a"), task("b")]);
    expect(order).toHaveLength(4);
    expect(order[1]).toBe(order[0].replace("start", "end"));
    expect(order[3]).toBe(order[2].replace("start", "end"));
  });

  it("times out when the lock stays held", async () => {
    const path = join(dir, "lab");
    const held = new FileLock(path, "topology lab");
    const impatient = new FileLock(path, "topology lab", { retries: 0 });

    await held.runAsync(async () => {
      await expect(impatient.runAsync(async () => "never")).rejects.toMatchObject({
        code: "ERR_TIMEOUT_LOCK",
      });
    });
  });
});
