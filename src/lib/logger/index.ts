import { consola } from "consola";
import { createRequestLogger, initLogger } from "evlog";
import type { RequestLogger } from "evlog";

export type OutputMode = "normal" | "json" | "verbose" | "silent";

let currentMode: OutputMode = "normal";

/**
 * Configure consola and evlog for one CLI invocation.
 *
 * consola carries the human-facing lines (connection logs, errors), evlog the
 * structured wide event each command emits in `--json` and `--verbose` modes.
 */
export function initTermlinkLogger(mode: OutputMode): void {
  currentMode = mode;

  switch (mode) {
    case "normal":
      initLogger({ enabled: false, env: { service: "termlink" } });
      break;

    case "json":
      consola.level = -999;
      initLogger({ enabled: true, pretty: false, stringify: true, env: { service: "termlink" } });
      break;

    case "verbose":
      consola.level = 4;
      consola.options.formatOptions = {
        ...consola.options.formatOptions,
        date: true,
      };
      initLogger({ enabled: true, pretty: true, stringify: false, env: { service: "termlink" } });
      break;

    case "silent":
      consola.level = -999;
      initLogger({ enabled: false, env: { service: "termlink" } });
      break;
  }
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

export interface CommandLogger {
  /** Add structured context to the wide event */
  set: RequestLogger["set"];
  /** Record an error in the wide event */
  error: RequestLogger["error"];
  /** Emit the wide event (only produces output in json/verbose modes) */
  emit: () => void;
}

export function createCommandLogger(command: string): CommandLogger {
  const reqLog = createRequestLogger({ path: command });

  return {
    set: reqLog.set.bind(reqLog),
    error: reqLog.error.bind(reqLog),
    emit: () => {
      if (currentMode === "json" || currentMode === "verbose") {
        reqLog.emit();
      }
    },
  };
}
