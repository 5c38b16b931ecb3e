import type { VmtopoContext } from "../context.ts";
import type { MachineRecord, RenderStateStore } from "../lib/render-state.ts";
import type { Hypervisor, MachineStatus } from "../hypervisor/types.ts";
import type { VmtopoLogger } from "../vmtopo-logger.ts";
import type { MachinePhase } from "../hooks.ts";
import { machineVmName, selectMachines } from "../topology/loader.ts";
import { buildNetworkAttachments } from "../topology/attachments.ts";
import { toGuestCommand } from "../topology/steps.ts";
import {
  formatImage,
  type MachineSpec,
  type MachineTarget,
  type Topology,
} from "../topology/types.ts";
import {
  ProvisionError,
  VmtopoError,
  machineNotCreatedError,
  machineNotRunningError,
  provisionStepFailedError,
  unexpectedHypervisorError,
} from "../errors/index.ts";
import { toError } from "../lib/utils.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MachineSelection {
  /** Machine names to target; every machine when empty or omitted. */
  machines?: string[];
}

export interface UpOptions extends MachineSelection {
  /** Run provisioning even on machines that already completed it. */
  provision?: boolean;
  /** Render machines concurrently instead of one after another. */
  parallel?: boolean;
}

export interface MachineResult {
  machine: string;
  vmName: string;
  success: boolean;
  created: boolean;
  provisioned: boolean;
  /** Steps attempted in this run, including a failing one. */
  stepsRun: number;
  error?: VmtopoError;
}

export interface RenderReport {
  topology: string;
  results: MachineResult[];
  succeeded: string[];
  failed: string[];
}

export interface MachineStatusReport {
  machine: string;
  vmName: string;
  status: MachineStatus;
  record: MachineRecord | null;
}

export interface DestroyResult {
  machine: string;
  vmName: string;
  success: boolean;
  removed: boolean;
  error?: VmtopoError;
}

interface Progress {
  created: boolean;
  provisioned: boolean;
  stepsRun: number;
}

function asVmtopoError(error: unknown, machine: string): VmtopoError {
  return error instanceof VmtopoError ? error : unexpectedHypervisorError(machine, toError(error));
}

async function inOrder<T, R>(items: T[], fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  for (const item of items) {
    results.push(await fn(item));
  }
  return results;
}

function buildReport(topology: string, results: MachineResult[]): RenderReport {
  return {
    topology,
    results,
    succeeded: results.filter((r) => r.success).map((r) => r.machine),
    failed: results.filter((r) => !r.success).map((r) => r.machine),
  };
}

// ---------------------------------------------------------------------------
// TopologyService
// ---------------------------------------------------------------------------

export class TopologyService {
  readonly paths: VmtopoContext["paths"];
  readonly store: RenderStateStore;
  readonly hooks: VmtopoContext["hooks"];
  readonly logger: VmtopoLogger;
  readonly hypervisor: Hypervisor;

  constructor(ctx: VmtopoContext) {
    this.paths = ctx.paths;
    this.store = ctx.store;
    this.hooks = ctx.hooks;
    this.logger = ctx.logger;
    this.hypervisor = ctx.hypervisor;
  }

  /** Plugin hooks never break an operation; failures are only logged. */
  private async safeHook(result: void | Promise<unknown>): Promise<void> {
    try {
      await result;
    } catch (error) {
      this.logger.warn(`Plugin hook failed: ${toError(error).message}`);
    }
  }

  private target(topology: Topology, spec: MachineSpec): MachineTarget {
    return { machine: spec.name, vmName: machineVmName(topology, spec) };
  }

  private saveRecord(
    topology: Topology,
    target: MachineTarget,
    fields: Pick<MachineRecord, "status" | "provisioned" | "stepsRun" | "failedStep" | "error">,
  ): MachineRecord {
    const record: MachineRecord = {
      topology: topology.name,
      machine: target.machine,
      vmName: target.vmName,
      ...fields,
      updatedAt: new Date().toISOString(),
    };
    this.store.save(record);
    return record;
  }

  private async fail(
    topology: Topology,
    target: MachineTarget,
    error: unknown,
    progress: Progress,
    phase: MachinePhase,
  ): Promise<MachineResult> {
    const err = asVmtopoError(error, target.machine);
    try {
      this.saveRecord(topology, target, {
        status: "error",
        provisioned: progress.provisioned,
        stepsRun: progress.stepsRun,
        failedStep: err instanceof ProvisionError ? err.stepIndex : null,
        error: err.message,
      });
    } catch (saveError) {
      this.logger
        .withTag(target.machine)
        .warn(`Could not record the failure: ${toError(saveError).message}`);
    }
    this.logger.withTag(target.machine).error(err.message);
    await this.safeHook(
      this.hooks.callHook("machine:error", { topology: topology.name, target, error: err, phase }),
    );
    return { machine: target.machine, vmName: target.vmName, success: false, ...progress, error: err };
  }

  /** Runs every step in order and stops at the first non-zero exit. */
  private async runSteps(target: MachineTarget, spec: MachineSpec, progress: Progress): Promise<void> {
    const log = this.logger.withTag(spec.name);

    for (const [stepIndex, step] of spec.provisionSteps.entries()) {
      const command = toGuestCommand(step, spec.name, stepIndex);
      await this.safeHook(
        this.hooks.callHook("provision:beforeStep", { target, stepIndex, command }),
      );

      log.start(`Provisioning step ${stepIndex} (${command.label})...`);
      const result = await this.hypervisor.exec(target, command);
      progress.stepsRun++;

      await this.safeHook(this.hooks.callHook("provision:afterStep", { target, stepIndex, result }));

      if (result.exitCode !== 0) {
        throw provisionStepFailedError(spec.name, stepIndex, result.exitCode, result.stderr);
      }
    }
    progress.provisioned = true;
  }

  // -----------------------------------------------------------------------
  // up
  // -----------------------------------------------------------------------

  async up(topology: Topology, opts: UpOptions = {}): Promise<RenderReport> {
    const machines = selectMachines(topology, opts.machines);
    const render = (spec: MachineSpec) => this.renderMachine(topology, spec, opts.provision ?? false);

    const results = opts.parallel
      ? await Promise.all(machines.map(render))
      : await inOrder(machines, render);
    return buildReport(topology.name, results);
  }

  private async renderMachine(
    topology: Topology,
    spec: MachineSpec,
    forceProvision: boolean,
  ): Promise<MachineResult> {
    const { hypervisor } = this;
    const target = this.target(topology, spec);
    const log = this.logger.withTag(spec.name);
    const progress: Progress = { created: false, provisioned: false, stepsRun: 0 };

    await this.safeHook(
      this.hooks.callHook("machine:beforeRender", { topology: topology.name, target, spec }),
    );

    try {
      const previous = this.store.load(topology.name, spec.name);
      progress.provisioned = previous?.status !== "destroyed" && (previous?.provisioned ?? false);

      log.start(`Bringing up ${target.vmName} from ${formatImage(spec.image)}...`);
      await hypervisor.ensureImage(target, spec.image);

      const handle = await hypervisor.createMachine(target, {
        image: spec.image,
        memoryMb: spec.memoryMb,
        cpuCount: spec.cpuCount,
      });
      progress.created = handle.created;
      if (handle.created) progress.provisioned = false;
      this.logger.debug(`${target.vmName}: ${handle.created ? "created" : "reused"}`);

      const attachments = buildNetworkAttachments(topology, spec);
      await hypervisor.attachNetwork(target, attachments);
      await this.safeHook(this.hooks.callHook("network:afterAttach", { target, attachments }));

      await hypervisor.startMachine(target);
      await hypervisor.configureGuestNetwork(target, attachments);

      if (forceProvision || !progress.provisioned) {
        progress.provisioned = false;
        await this.runSteps(target, spec, progress);
      } else {
        log.info("Already provisioned. Run with --provision to run the steps again.");
      }

      const record = this.saveRecord(topology, target, {
        status: "rendered",
        provisioned: progress.provisioned,
        stepsRun: progress.stepsRun,
        failedStep: null,
        error: null,
      });
      await this.safeHook(this.hooks.callHook("machine:afterRender", record));
      log.success(`${spec.name} is up`);

      return { machine: spec.name, vmName: target.vmName, success: true, ...progress };
    } catch (error) {
      return this.fail(topology, target, error, progress, "up");
    }
  }

  // -----------------------------------------------------------------------
  // provision
  // -----------------------------------------------------------------------

  async provision(topology: Topology, opts: MachineSelection = {}): Promise<RenderReport> {
    const machines = selectMachines(topology, opts.machines);
    const results = await inOrder(machines, (spec) => this.reprovisionMachine(topology, spec));
    return buildReport(topology.name, results);
  }

  private async reprovisionMachine(topology: Topology, spec: MachineSpec): Promise<MachineResult> {
    const target = this.target(topology, spec);
    const progress: Progress = { created: false, provisioned: false, stepsRun: 0 };

    try {
      const status = await this.hypervisor.status(target);
      if (status === "not-created") throw machineNotCreatedError(spec.name);
      if (status !== "running") throw machineNotRunningError(spec.name, status);

      await this.runSteps(target, spec, progress);

      const record = this.saveRecord(topology, target, {
        status: "rendered",
        provisioned: true,
        stepsRun: progress.stepsRun,
        failedStep: null,
        error: null,
      });
      await this.safeHook(this.hooks.callHook("machine:afterRender", record));
      this.logger.withTag(spec.name).success(`${spec.name} provisioned`);

      return { machine: spec.name, vmName: target.vmName, success: true, ...progress };
    } catch (error) {
      return this.fail(topology, target, error, progress, "provision");
    }
  }

  // -----------------------------------------------------------------------
  // status / destroy
  // -----------------------------------------------------------------------

  async status(topology: Topology, opts: MachineSelection = {}): Promise<MachineStatusReport[]> {
    const machines = selectMachines(topology, opts.machines);
    return inOrder(machines, async (spec) => {
      const target = this.target(topology, spec);
      return {
        machine: spec.name,
        vmName: target.vmName,
        status: await this.hypervisor.status(target),
        record: this.store.load(topology.name, spec.name),
      };
    });
  }

  async destroy(topology: Topology, opts: MachineSelection = {}): Promise<DestroyResult[]> {
    const machines = selectMachines(topology, opts.machines);
    return inOrder(machines, async (spec): Promise<DestroyResult> => {
      const target = this.target(topology, spec);
      const log = this.logger.withTag(spec.name);

      try {
        log.start(`Destroying ${target.vmName}...`);
        const removed = await this.hypervisor.destroy(target);
        this.saveRecord(topology, target, {
          status: "destroyed",
          provisioned: false,
          stepsRun: 0,
          failedStep: null,
          error: null,
        });
        await this.safeHook(
          this.hooks.callHook("machine:afterDestroy", { topology: topology.name, target, removed }),
        );
        if (removed) log.success(`Destroyed ${target.vmName}`);
        else log.info(`${target.vmName} was not created`);

        return { machine: spec.name, vmName: target.vmName, success: true, removed };
      } catch (error) {
        const err = asVmtopoError(error, spec.name);
        log.error(err.message);
        await this.safeHook(
          this.hooks.callHook("machine:error", {
            topology: topology.name,
            target,
            error: err,
            phase: "destroy",
          }),
        );
        return { machine: spec.name, vmName: target.vmName, success: false, removed: false, error: err };
      }
    });
  }
}
