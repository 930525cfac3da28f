#!/usr/bin/env -S npx tsx

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { defineCommand, runMain } from "citty";
import { initTermlinkLogger } from "../src/lib/logger/index.ts";

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const pkgPath = join(dir, "package.json");
    if (existsSync(pkgPath)) {
      const pkg: { version?: unknown } = JSON.parse(readFileSync(pkgPath, "utf8"));
      return typeof pkg.version === "string" ? pkg.version : "0.0.0";
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

const main = defineCommand({
  meta: {
    name: "termlink",
    version: findPackageVersion(),
    description: "Remote PTY shell over a framed TCP protocol",
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
      description: "Show debug output and the wide event tree",
    },
  },
  setup({ args }) {
    const mode = args.json ? "json" : args.verbose ? "verbose" : "normal";
    initTermlinkLogger(mode);
  },
  subCommands: {
    serve: () => import("../src/commands/serve.ts").then((m) => m.default),
    connect: () => import("../src/commands/connect.ts").then((m) => m.default),
    stop: () => import("../src/commands/stop.ts").then((m) => m.default),
  },
});

runMain(main);
