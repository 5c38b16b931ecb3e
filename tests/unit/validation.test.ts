import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../src/errors/index.ts";
import { toGuestCommand } from "../../src/topology/steps.ts";
import {
  ipInSubnet,
  parseBaseImage,
  parseCidr,
  parseCpuCount,
  parseForwardedPorts,
  parseIpv4,
  parseMachineName,
  parseMemoryMb,
  parsePort,
  parseProvider,
  parseProvisionSteps,
} from "../../src/topology/validation.ts";

describe("parseMemoryMb", () => {
  it("defaults to 512", () => {
    expect(parseMemoryMb(undefined)).toBe(512);
  });

  it("uses the given fallback when the field is absent", () => {
    expect(parseMemoryMb(undefined, "web01", 1024)).toBe(1024);
  });

  it("accepts integers and numeric strings", () => {
    expect(parseMemoryMb(2048)).toBe(2048);
    expect(parseMemoryMb("768")).toBe(768);
  });

  it("rejects values outside 128-65536", () => {
    expect(() => parseMemoryMb(64, "web01")).toThrow(
      'Invalid memory (machine "web01"): 64. Must be an integer between 128 and 65536 MB.',
    );
  });

  it("rejects fractions", () => {
    expect(() => parseMemoryMb(512.5)).toThrow(ConfigError);
  });
});

describe("parseCpuCount", () => {
  it("defaults to 1", () => {
    expect(parseCpuCount(undefined)).toBe(1);
  });

  it("rejects zero", () => {
    try {
      parseCpuCount(0, "db01");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: "ERR_CONFIG_INTEGER", machine: "db01", field: "cpus" });
    }
  });
});

describe("parsePort", () => {
  it("accepts numbers and digit strings", () => {
    expect(parsePort(8080)).toBe(8080);
    expect(parsePort("22")).toBe(22);
  });

  it("rejects out of range ports", () => {
    expect(() => parsePort(0)).toThrow(ConfigError);
    expect(() => parsePort(65536)).toThrow(ConfigError);
    expect(() => parsePort("80a")).toThrow(ConfigError);
  });
});

describe("parseMachineName", () => {
  it("accepts DNS labels", () => {
    expect(parseMachineName("web01")).toBe("web01");
    expect(parseMachineName("db-primary")).toBe("db-primary");
  });

  it("rejects leading hyphens, underscores and empty names", () => {
    expect(() => parseMachineName("-web")).toThrow(ConfigError);
    expect(() => parseMachineName("web_01")).toThrow(ConfigError);
    expect(() => parseMachineName("")).toThrow(ConfigError);
    expect(() => parseMachineName(42)).toThrow(ConfigError);
  });

  it("accepts lowercase names only", () => {
    expect(() => parseMachineName("Web01")).toThrow(ConfigError);
  });

  it("reports the field it was given", () => {
    expect(() => parseMachineName("a b", "machines[2].name")).toThrow(
      'Invalid machines[2].name: "a b".',
    );
  });
});

describe("parseProvider", () => {
  it("defaults to virtualbox", () => {
    expect(parseProvider(undefined)).toBe("virtualbox");
  });

  it("rejects unknown providers", () => {
    expect(() => parseProvider("hyperv")).toThrow(
      'Invalid provider: "hyperv". Must be one of: virtualbox',
    );
  });
});

describe("parseIpv4", () => {
  it("trims and accepts dotted quads", () => {
    expect(parseIpv4(" 192.168.56.10 ")).toBe("192.168.56.10");
  });

  it("rejects leading zeros and large octets", () => {
    expect(() => parseIpv4("192.168.056.10")).toThrow(ConfigError);
    expect(() => parseIpv4("192.168.56.256")).toThrow(ConfigError);
    expect(() => parseIpv4("192.168.56")).toThrow(ConfigError);
  });
});

describe("parseCidr / ipInSubnet", () => {
  it("parses network and prefix", () => {
    expect(parseCidr("192.168.56.0/24")).toEqual({ network: "192.168.56.0", prefixLength: 24 });
  });

  it("rejects malformed input", () => {
    expect(() => parseCidr("192.168.56.0")).toThrow(ConfigError);
    expect(() => parseCidr("192.168.56.0/33")).toThrow(ConfigError);
    expect(() => parseCidr("192.168.56.0/24/1")).toThrow(ConfigError);
  });

  it("checks subnet membership", () => {
    const cidr = parseCidr("192.168.56.0/24");
    expect(ipInSubnet("192.168.56.200", cidr)).toBe(true);
    expect(ipInSubnet("192.168.57.1", cidr)).toBe(false);
    expect(ipInSubnet("10.1.2.3", parseCidr("0.0.0.0/0"))).toBe(true);
  });
});

describe("parseBaseImage", () => {
  it("parses box without version", () => {
    expect(parseBaseImage("ubuntu/jammy64", "virtualbox")).toEqual({
      provider: "virtualbox",
      box: "ubuntu/jammy64",
      version: null,
    });
  });

  it("parses box@version", () => {
    expect(parseBaseImage("debian/bookworm64@12.20240905.1", "virtualbox")).toEqual({
      provider: "virtualbox",
      box: "debian/bookworm64",
      version: "12.20240905.1",
    });
  });

  it("rejects empty versions and malformed boxes", () => {
    expect(() => parseBaseImage("ubuntu/jammy64@", "virtualbox", "web01")).toThrow(ConfigError);
    expect(() => parseBaseImage("a/b/c", "virtualbox")).toThrow(ConfigError);
    expect(() => parseBaseImage(7, "virtualbox")).toThrow(ConfigError);
  });
});

describe("parseForwardedPorts", () => {
  it("returns an empty list when absent", () => {
    expect(parseForwardedPorts(undefined, "web01")).toEqual([]);
  });

  it("parses objects exactly as given", () => {
    expect(parseForwardedPorts([{ guest: 80, host: 8080 }], "web01")).toEqual([
      { guestPort: 80, hostPort: 8080, protocol: "tcp" },
    ]);
  });

  it("parses host:guest strings with an optional protocol", () => {
    expect(parseForwardedPorts(["8443:443", "5353:53/udp"], "web01")).toEqual([
      { hostPort: 8443, guestPort: 443, protocol: "tcp" },
      { hostPort: 5353, guestPort: 53, protocol: "udp" },
    ]);
  });

  it("rejects unknown protocols and malformed entries", () => {
    expect(() => parseForwardedPorts(["80:80/sctp"], "web01")).toThrow(ConfigError);
    expect(() => parseForwardedPorts([{ guest: 80 }], "web01")).toThrow(ConfigError);
    expect(() => parseForwardedPorts("8080:80", "web01")).toThrow(ConfigError);
  });
});

describe("parseProvisionSteps", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vmtopo-steps-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps inline steps in order", () => {
    expect(parseProvisionSteps(["apt-get update", { inline: "echo ok" }], "web01", dir)).toEqual([
      { kind: "inline", script: "apt-get update" },
      { kind: "inline", script: "echo ok" },
    ]);
  });

  it("resolves script paths against the base directory", () => {
    writeFileSync(join(dir, "setup.sh"), "echo setup\n");
    expect(parseProvisionSteps([{ path: "setup.sh" }], "web01", dir)).toEqual([
      { kind: "file", path: join(dir, "setup.sh") },
    ]);
  });

  it("reports a missing script with its step index", () => {
    try {
      parseProvisionSteps(["true", { path: "missing.sh" }], "web01", dir);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        code: "ERR_CONFIG_SCRIPT_NOT_FOUND",
        machine: "web01",
        stepIndex: 1,
      });
    }
  });

  it("offsets step indexes", () => {
    try {
      parseProvisionSteps([""], "db01", dir, 2);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: "ERR_CONFIG_PROVISION_STEP", stepIndex: 2 });
    }
  });

  it("rejects directories as script steps", () => {
    mkdirSync(join(dir, "scripts"));
    expect(() => parseProvisionSteps([{ path: "scripts" }], "web01", dir)).toThrow(
      `Invalid provisioning step 0 of machine "web01": ${join(dir, "scripts")} is not a regular file`,
    );
  });

  it("refuses to run a script path that became a directory", () => {
    mkdirSync(join(dir, "setup.sh"));
    try {
      toGuestCommand({ kind: "file", path: join(dir, "setup.sh") }, "web01", 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: "ERR_CONFIG_PROVISION_STEP", stepIndex: 1 });
    }
  });

  it("rejects steps with both inline and path", () => {
    expect(() =>
      parseProvisionSteps([{ inline: "true", path: "x.sh" }], "web01", dir),
    ).toThrow('Invalid provisioning step 0 of machine "web01": use either inline or path, not both');
  });
});
