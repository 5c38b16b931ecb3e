#!/usr/bin/env -S node --import tsx

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { defineCommand, runMain } from "citty";
import { initVmtopoLogger } from "../src/lib/logger/index.ts";

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const pkgPath = join(dir, "package.json");
    if (existsSync(pkgPath)) {
      return JSON.parse(readFileSync(pkgPath, "utf8")).version;
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

const main = defineCommand({
  meta: {
    name: "vmtopo",
    version: findPackageVersion(),
    description: "Render declarative multi-machine topologies onto VirtualBox",
  },
  args: {
    json: {
      type: "boolean",
      default: false,
      description: "Output structured JSON (one event per command)",
    },
    verbose: {
      type: "boolean",
      default: false,
      description: "Show every hypervisor call and the wide event tree",
    },
  },
  setup({ args }) {
    initVmtopoLogger(args.json ? "json" : args.verbose ? "verbose" : "normal");
  },
  subCommands: {
    up: () => import("../src/commands/up.ts").then((m) => m.default),
    status: () => import("../src/commands/status.ts").then((m) => m.default),
    destroy: () => import("../src/commands/destroy.ts").then((m) => m.default),
    provision: () => import("../src/commands/provision.ts").then((m) => m.default),
    validate: () => import("../src/commands/validate.ts").then((m) => m.default),
    plan: () => import("../src/commands/plan.ts").then((m) => m.default),
  },
});

runMain(main);
