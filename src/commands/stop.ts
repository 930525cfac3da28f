import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { daemonNotRunningError, handleCommandError } from "../errors/index.ts";
import { createCommandLogger } from "../lib/logger/index.ts";
import { PidFile } from "../lib/pid-file.ts";
import { termlinkPaths } from "../paths.ts";

const stopCommand = defineCommand({
  meta: {
    name: "stop",
    description: "Stop a daemon started with 'termlink serve --daemon'",
  },
  args: {
    pidfile: {
      type: "string",
      description: "PID file of the daemon (default ~/.termlink/termlink.pid)",
    },
  },
  run({ args }) {
    const cmdLog = createCommandLogger("stop");

    try {
      const pidFile = new PidFile(args.pidfile ?? termlinkPaths().pidFile);
      const pid = pidFile.kill("SIGTERM");
      if (pid === null) throw daemonNotRunningError(pidFile.path);

      consola.success(`Stopped termlink daemon (pid ${pid})`);
      cmdLog.set({ pid, pidFile: pidFile.path });
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
      process.exitCode = 1;
    }
  },
});

export default stopCommand as CommandDef;
