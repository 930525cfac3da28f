import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { loadClientConfig } from "../config.ts";
import { handleCommandError } from "../errors/index.ts";
import { createCommandLogger } from "../lib/logger/index.ts";
import { TerminalBridge } from "../lib/shell/index.ts";
import { createDefaultLogger } from "../termlink-logger.ts";
import { exitCodeFor, onShutdownSignal, type ShutdownSignal } from "./signals.ts";

const connectCommand = defineCommand({
  meta: {
    name: "connect",
    description: "Open a remote shell on a termlink daemon (remote command after --)",
  },
  args: {
    host: {
      type: "string",
      description: "Daemon address (env TERMLINK_HOST, default 127.0.0.1)",
    },
    port: {
      type: "string",
      alias: "p",
      description: "Daemon port (env TERMLINK_PORT, default 7070)",
    },
    url: {
      type: "string",
      description: "Daemon as tcp://host:port (overrides --host and --port)",
    },
    token: {
      type: "string",
      description: "Shared secret (env TERMLINK_TOKEN)",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("connect");
    const interrupted: { signal: ShutdownSignal | null } = { signal: null };
    let disposeSignals = (): void => {};

    try {
      const config = loadClientConfig({
        host: args.host,
        port: args.port,
        url: args.url,
        token: args.token,
        cmd: args._.map(String),
      });

      consola.debug(`Connecting to ${config.host}:${config.port}`);
      const bridge = new TerminalBridge({ ...config, logger: createDefaultLogger().withTag("connect") });

      disposeSignals = onShutdownSignal((signal) => {
        interrupted.signal = signal;
        if (!bridge.close("interrupted")) {
          process.exit(exitCodeFor(signal));
        }
      });

      const result = await bridge.run();
      cmdLog.set({
        host: config.host,
        port: config.port,
        cmd: config.cmd,
        reason: result.reason,
        errors: result.errors,
      });
      cmdLog.emit();

      if (result.errors.length > 0) process.exitCode = 1;
      if (interrupted.signal) process.exitCode = exitCodeFor(interrupted.signal);
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    } finally {
      disposeSignals();
    }
  },
});

export default connectCommand as CommandDef;
