import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { loadServerConfig } from "../config.ts";
import { createTermlinkServer } from "../context.ts";
import { daemonRunningError, handleCommandError } from "../errors/index.ts";
import { daemonize, foregroundArgs } from "../lib/daemon.ts";
import { createCommandLogger } from "../lib/logger/index.ts";
import { PidFile } from "../lib/pid-file.ts";
import { termlinkPaths } from "../paths.ts";
import { exitCodeFor, onShutdownSignal, type ShutdownSignal } from "./signals.ts";

const serveCommand = defineCommand({
  meta: {
    name: "serve",
    description: "Run the PTY daemon",
  },
  args: {
    host: {
      type: "string",
      description: "Address to bind (env TERMLINK_HOST, default 0.0.0.0)",
    },
    port: {
      type: "string",
      alias: "p",
      description: "Port to listen on (env TERMLINK_PORT, default 7070)",
    },
    token: {
      type: "string",
      description: "Shared secret clients must present (env TERMLINK_TOKEN)",
    },
    shell: {
      type: "string",
      description: "Shell for interactive sessions (env TERMLINK_SHELL, default $SHELL)",
    },
    daemon: {
      type: "boolean",
      alias: "d",
      default: false,
      description: "Run in the background and return immediately",
    },
    pidfile: {
      type: "string",
      description: "Write the server PID to this file (default ~/.termlink/termlink.pid with --daemon)",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("serve");

    try {
      const config = loadServerConfig({
        host: args.host,
        port: args.port,
        token: args.token,
        shell: args.shell,
      });

      if (args.daemon) {
        const pidPath = args.pidfile ?? termlinkPaths().pidFile;
        const childArgs = foregroundArgs(process.argv.slice(2));
        if (!args.pidfile) childArgs.push("--pidfile", pidPath);

        const pid = daemonize({ args: childArgs, pidFile: pidPath });
        consola.success(`termlink daemon started (pid ${pid}, pid file ${pidPath})`);
        cmdLog.set({ daemon: true, pid, pidFile: pidPath, port: config.port });
        cmdLog.emit();
        return;
      }

      const pidFile = args.pidfile ? new PidFile(args.pidfile) : null;
      const running = pidFile?.read() ?? null;
      if (pidFile && running !== null && running !== process.pid) {
        throw daemonRunningError(running, pidFile.path);
      }

      if (!config.token) {
        consola.warn("No TERMLINK_TOKEN set: any client that can reach this port gets a shell.");
      }

      const server = await createTermlinkServer({ config });
      const shutdown = new Promise<ShutdownSignal>((resolve) => {
        const dispose = onShutdownSignal((signal) => {
          dispose();
          resolve(signal);
        });
      });

      const address = await server.listen();
      pidFile?.write(process.pid);
      cmdLog.set({
        host: address.address,
        port: address.port,
        auth: Boolean(config.token),
        pid: process.pid,
      });

      const signal = await shutdown;
      consola.info(`Received ${signal}, closing ${server.connections} connection(s)`);
      await server.close();
      pidFile?.remove(process.pid);

      cmdLog.set({ signal });
      cmdLog.emit();
      process.exitCode = exitCodeFor(signal);
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default serveCommand as CommandDef;
