import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createVmtopo } from "../../src/context.ts";
import { definePlugin } from "../../src/plugin.ts";
import { createSilentLogger } from "../../src/vmtopo-logger.ts";
import { MemoryHypervisor, describeCall, type MemoryHypervisorOptions } from "../../src/hypervisor/memory.ts";
import { MemoryRenderStateStore } from "../../src/stores/memory.ts";
import { FileRenderStateStore, type MachineRecord } from "../../src/lib/render-state.ts";
import { parseTopology } from "../../src/topology/loader.ts";
import type { Topology } from "../../src/topology/types.ts";
import type { VmtopoPlugin } from "../../src/plugin.ts";
import {
  HypervisorError,
  ImageNotFoundError,
  MachineError,
  NetworkBindError,
  ProvisionError,
} from "../../src/errors/index.ts";

describe("TopologyService", () => {
  let dir: string;
  let store: MemoryRenderStateStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vmtopo-service-"));
    store = new MemoryRenderStateStore();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function lab(raw: Record<string, unknown> = {}): Topology {
    return parseTopology(
      {
        name: "lab",
        defaults: { image: "ubuntu/jammy64" },
        machines: [
          { name: "web01", ip: "192.168.56.11", ports: [{ guest: 80, host: 8080 }], provision: ["echo web01"] },
          { name: "web02", ip: "192.168.56.12", provision: ["echo web02"] },
          { name: "db01", ip: "192.168.56.20", provision: ["echo db", "exit 1", "echo never"] },
        ],
        ...raw,
      },
      { baseDir: dir },
    );
  }

  const failOnExit1: MemoryHypervisorOptions["onExec"] = (_target, command) =>
    command.script === "exit 1" ? { exitCode: 1, stdout: "", stderr: "boom" } : 0;

  async function setup(options: MemoryHypervisorOptions = {}, plugins: VmtopoPlugin[] = []) {
    const hypervisor = new MemoryHypervisor(options);
    const service = await createVmtopo({
      paths: dir,
      store,
      hypervisor,
      logger: createSilentLogger(),
      plugins,
    });
    return { hypervisor, service };
  }

  describe("up", () => {
    it("reports one failure and continues with the other machines", async () => {
      const { service } = await setup({ onExec: failOnExit1 });
      const report = await service.up(lab());

      expect(report.topology).toBe("lab");
      expect(report.succeeded).toEqual(["web01", "web02"]);
      expect(report.failed).toEqual(["db01"]);

      const db = report.results[2];
      expect(db.success).toBe(false);
      expect(db.stepsRun).toBe(2);
      expect(db.error).toBeInstanceOf(ProvisionError);
      expect(db.error).toMatchObject({ machine: "db01", stepIndex: 1, exitCode: 1 });
      expect(db.error?.message).toBe('Provisioning step 1 failed on "db01" (exit code 1)');
      expect(db.error?.why).toBe("boom");
    });

    it("renders each machine in order: image, create, network, start, guest network, steps", async () => {
      const { hypervisor, service } = await setup();
      await service.up(lab());

      const ops = (vmName: string) =>
        hypervisor.calls.filter((c) => c.vmName === vmName).map((c) => c.op);
      expect(ops("lab_web01")).toEqual([
        "ensureImage",
        "createMachine",
        "attachNetwork",
        "startMachine",
        "configureGuestNetwork",
        "exec",
      ]);
      expect(ops("lab_db01")).toEqual([
        "ensureImage",
        "createMachine",
        "attachNetwork",
        "startMachine",
        "configureGuestNetwork",
        "exec",
        "exec",
        "exec",
      ]);

      const firstCallOf = (vmName: string) => hypervisor.calls.findIndex((c) => c.vmName === vmName);
      expect(firstCallOf("lab_web01")).toBeLessThan(firstCallOf("lab_web02"));
      expect(firstCallOf("lab_web02")).toBeLessThan(firstCallOf("lab_db01"));
    });

    it("passes forwarded ports through unchanged", async () => {
      const { hypervisor, service } = await setup();
      await service.up(lab(), { machines: ["web01"] });

      expect(hypervisor.machine("lab_web01")?.attachments).toEqual([
        { kind: "private", ip: "192.168.56.11", prefixLength: 24 },
        { kind: "forwarded-port", guestPort: 80, hostPort: 8080, protocol: "tcp" },
      ]);
    });

    it("stops a machine at its first failing step", async () => {
      const { hypervisor, service } = await setup({ onExec: failOnExit1 });
      await service.up(lab(), { machines: ["db01"] });

      expect(hypervisor.machine("lab_db01")?.executed).toEqual(["echo db"]);
      expect(hypervisor.execCount("lab_db01")).toBe(2);
    });

    it("records the failed step", async () => {
      const { service } = await setup({ onExec: failOnExit1 });
      await service.up(lab());

      expect(store.load("lab", "db01")).toMatchObject({
        status: "error",
        provisioned: false,
        stepsRun: 2,
        failedStep: 1,
        error: 'Provisioning step 1 failed on "db01" (exit code 1)',
      });
      expect(store.load("lab", "web01")).toMatchObject({
        status: "rendered",
        provisioned: true,
        stepsRun: 1,
        failedStep: null,
      });
    });

    it("targets only the named machines", async () => {
      const { hypervisor, service } = await setup();
      const report = await service.up(lab(), { machines: ["web02"] });

      expect(report.results.map((r) => r.machine)).toEqual(["web02"]);
      expect(new Set(hypervisor.calls.map((c) => c.vmName))).toEqual(new Set(["lab_web02"]));
    });

    it("reuses machines and skips provisioning that already completed", async () => {
      let runs = 0;
      const { service } = await setup({
        onExec: () => {
          runs++;
          return 0;
        },
      });
      const topology = lab({ machines: [{ name: "web01", provision: ["echo one", "echo two"] }] });

      const first = await service.up(topology);
      expect(first.results[0]).toMatchObject({ created: true, provisioned: true, stepsRun: 2 });
      expect(runs).toBe(2);

      const second = await service.up(topology);
      expect(second.results[0]).toMatchObject({
        success: true,
        created: false,
        provisioned: true,
        stepsRun: 0,
      });
      expect(runs).toBe(2);

      await service.up(topology, { provision: true });
      expect(runs).toBe(4);
    });

    it("retries provisioning on the next up after a failure", async () => {
      let fail = true;
      const { hypervisor, service } = await setup({
        onExec: (_target, command) => (command.script === "flaky" && fail ? 3 : 0),
      });
      const topology = lab({ machines: [{ name: "web01", provision: ["flaky"] }] });

      const first = await service.up(topology);
      expect(first.failed).toEqual(["web01"]);

      fail = false;
      const second = await service.up(topology);
      expect(second.results[0]).toMatchObject({ success: true, created: false, stepsRun: 1 });
      expect(hypervisor.execCount("lab_web01")).toBe(2);
    });

    it("fails with ImageNotFoundError before creating the machine", async () => {
      const { hypervisor, service } = await setup({ images: ["ubuntu/jammy64"] });
      const topology = lab({
        machines: [
          { name: "web01", image: "centos/7" },
          { name: "web02" },
        ],
      });

      const report = await service.up(topology);
      expect(report.failed).toEqual(["web01"]);
      expect(report.succeeded).toEqual(["web02"]);
      expect(report.results[0].error).toBeInstanceOf(ImageNotFoundError);
      expect(report.results[0].error).toMatchObject({ machine: "web01", image: "centos/7" });
      expect(hypervisor.machine("lab_web01")).toBeNull();
    });

    it("fails with NetworkBindError and never provisions", async () => {
      const { hypervisor, service } = await setup({ hostOnlySubnets: ["192.168.56.0/24"] });
      const topology = lab({
        machines: [{ name: "web01", ip: "10.0.0.5", provision: ["echo hi"] }],
      });

      const report = await service.up(topology);
      expect(report.results[0].error).toBeInstanceOf(NetworkBindError);
      expect(report.results[0].error).toMatchObject({ machine: "web01", network: "10.0.0.5" });
      expect(hypervisor.calls.map((c) => c.op)).toEqual([
        "ensureImage",
        "createMachine",
        "attachNetwork",
      ]);
    });

    it("rejects a missing bridge", async () => {
      const { service } = await setup({ bridges: ["eth0"] });
      const topology = lab({ machines: [{ name: "web01", public: true, bridge: "wlan0" }] });

      const report = await service.up(topology);
      expect(report.results[0].error).toMatchObject({
        code: "ERR_NETWORK_NO_BRIDGE",
        network: "wlan0",
      });
    });

    it("wraps unexpected errors in HypervisorError", async () => {
      const { service } = await setup({
        onExec: () => {
          throw new Error("socket closed");
        },
      });
      const report = await service.up(lab(), { machines: ["web01"] });

      const error = report.results[0].error;
      expect(error).toBeInstanceOf(HypervisorError);
      expect(error?.code).toBe("ERR_HYPERVISOR_UNEXPECTED");
      expect(error?.message).toBe('Rendering "web01" failed: socket closed');
    });

    it("runs file steps with the script contents", async () => {
      writeFileSync(join(dir, "setup.sh"), "echo from-file\n");
      const { hypervisor, service } = await setup();
      const topology = lab({ machines: [{ name: "web01", provision: [{ path: "setup.sh" }] }] });

      await service.up(topology);
      const exec = hypervisor.calls.find((c) => c.op === "exec");
      expect(exec).toEqual({
        op: "exec",
        vmName: "lab_web01",
        command: { label: join(dir, "setup.sh"), script: "echo from-file\n" },
      });
    });

    it("reports parallel results in topology order", async () => {
      const { service } = await setup({
        onExec: async (target, command) => {
          if (target.machine === "web01") await new Promise((r) => setTimeout(r, 20));
          return command.script === "exit 1" ? 1 : 0;
        },
      });
      const report = await service.up(lab(), { parallel: true });

      expect(report.results.map((r) => r.machine)).toEqual(["web01", "web02", "db01"]);
      expect(report.succeeded).toEqual(["web01", "web02"]);
      expect(report.failed).toEqual(["db01"]);
    });
  });

  describe("state store failures", () => {
    it("fails only the machine whose record cannot be read", async () => {
      const stateDir = join(dir, "state");
      mkdirSync(join(stateDir, "lab"), { recursive: true });
      writeFileSync(join(stateDir, "lab", "web02.json"), "{not json");
      const fileStore = new FileRenderStateStore(stateDir);
      const service = await createVmtopo({
        paths: dir,
        store: fileStore,
        hypervisor: new MemoryHypervisor(),
        logger: createSilentLogger(),
      });
      const topology = lab({ machines: [{ name: "web01" }, { name: "web02" }, { name: "db01" }] });

      for (const parallel of [false, true]) {
        writeFileSync(join(stateDir, "lab", "web02.json"), "{not json");
        const report = await service.up(topology, { parallel });

        expect(report.succeeded).toEqual(["web01", "db01"]);
        expect(report.failed).toEqual(["web02"]);
        expect(report.results[1].error).toBeInstanceOf(HypervisorError);
        expect(report.results[1].error?.code).toBe("ERR_HYPERVISOR_UNEXPECTED");
        expect(fileStore.load("lab", "web02")?.status).toBe("error");
      }
    });

    it("still reports every machine when records cannot be written", async () => {
      class ReadOnlyStore extends MemoryRenderStateStore {
        override save(_record: MachineRecord): void {
          throw new Error("read-only file system");
        }
      }
      const service = await createVmtopo({
        paths: dir,
        store: new ReadOnlyStore(),
        hypervisor: new MemoryHypervisor(),
        logger: createSilentLogger(),
      });

      const report = await service.up(lab());
      expect(report.failed).toEqual(["web01", "web02", "db01"]);
      expect(report.results[0].error?.message).toBe(
        'Rendering "web01" failed: read-only file system',
      );
    });
  });

  describe("hooks", () => {
    it("calls plugin hooks around rendering and provisioning", async () => {
      const events: string[] = [];
      const plugin = definePlugin({
        name: "recorder",
        setup(ctx) {
          ctx.hooks.hook("machine:beforeRender", ({ target }) => {
            events.push(`before ${target.machine}`);
          });
          ctx.hooks.hook("network:afterAttach", ({ attachments }) => {
            events.push(`network ${attachments.length}`);
          });
          ctx.hooks.hook("provision:beforeStep", ({ stepIndex }) => {
            events.push(`step ${stepIndex}`);
          });
          ctx.hooks.hook("provision:afterStep", ({ result }) => {
            events.push(`exit ${result.exitCode}`);
          });
          ctx.hooks.hook("machine:afterRender", (record) => {
            events.push(`after ${record.machine} ${record.status}`);
          });
          ctx.hooks.hook("machine:error", ({ target, phase }) => {
            events.push(`error ${target.machine} ${phase}`);
          });
        },
      });
      const { service } = await setup({ onExec: failOnExit1 }, [plugin]);
      await service.up(lab(), { machines: ["web01", "db01"] });

      expect(events).toEqual([
        "before web01",
        "network 2",
        "step 0",
        "exit 0",
        "after web01 rendered",
        "before db01",
        "network 1",
        "step 0",
        "exit 0",
        "step 1",
        "exit 1",
        "error db01 up",
      ]);
    });

    it("keeps rendering when a hook throws", async () => {
      const plugin = definePlugin({
        name: "broken",
        setup(ctx) {
          ctx.hooks.hook("machine:beforeRender", () => {
            throw new Error("plugin bug");
          });
        },
      });
      const { service } = await setup({}, [plugin]);
      const report = await service.up(lab(), { machines: ["web01"] });
      expect(report.succeeded).toEqual(["web01"]);
    });
  });

  describe("provision", () => {
    it("fails on machines that were never created", async () => {
      const { service } = await setup();
      const report = await service.provision(lab(), { machines: ["web01"] });

      expect(report.results[0].error).toBeInstanceOf(MachineError);
      expect(report.results[0].error?.code).toBe("ERR_MACHINE_NOT_CREATED");
    });

    it("re-runs every step on running machines", async () => {
      const { hypervisor, service } = await setup();
      const topology = lab({ machines: [{ name: "web01", provision: ["echo a", "echo b"] }] });
      await service.up(topology);

      const report = await service.provision(topology);
      expect(report.results[0]).toMatchObject({ success: true, provisioned: true, stepsRun: 2 });
      expect(hypervisor.machine("lab_web01")?.executed).toEqual([
        "echo a",
        "echo b",
        "echo a",
        "echo b",
      ]);
    });
  });

  describe("status and destroy", () => {
    it("reports hypervisor status with the last record", async () => {
      const { service } = await setup({ onExec: failOnExit1 });
      const topology = lab();
      await service.up(topology, { machines: ["db01"] });

      const reports = await service.status(topology);
      expect(reports.map((r) => [r.machine, r.status])).toEqual([
        ["web01", "not-created"],
        ["web02", "not-created"],
        ["db01", "running"],
      ]);
      expect(reports[0].record).toBeNull();
      expect(reports[2].record?.failedStep).toBe(1);
    });

    it("destroys machines and provisions again after re-creation", async () => {
      const { hypervisor, service } = await setup();
      const topology = lab({ machines: [{ name: "web01", provision: ["echo a"] }] });
      await service.up(topology);

      const results = await service.destroy(topology);
      expect(results).toEqual([
        { machine: "web01", vmName: "lab_web01", success: true, removed: true },
      ]);
      expect(store.load("lab", "web01")?.status).toBe("destroyed");

      const again = await service.destroy(topology);
      expect(again[0].removed).toBe(false);

      const report = await service.up(topology);
      expect(report.results[0]).toMatchObject({ created: true, provisioned: true, stepsRun: 1 });
    });
  });

  describe("plan output", () => {
    it("describes every recorded call", async () => {
      const { hypervisor, service } = await setup();
      const topology = lab({ machines: [{ name: "web01", ip: "192.168.56.11", ports: ["8080:80"], provision: ["echo a"] }] });
      await service.up(topology, { provision: true });

      expect(hypervisor.calls.map(describeCall)).toEqual([
        "lab_web01: ensure image ubuntu/jammy64",
        "lab_web01: create (512 MB, 1 cpu)",
        "lab_web01: attach private 192.168.56.11/24, port 8080->80/tcp",
        "lab_web01: start",
        "lab_web01: configure guest private 192.168.56.11/24, port 8080->80/tcp",
        "lab_web01: run inline",
      ]);
    });
  });
});
