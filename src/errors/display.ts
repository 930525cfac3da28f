import { consola } from "consola";
import { EvlogError } from "evlog";
import type { CommandLogger } from "../lib/logger/index.ts";
import { getOutputMode } from "../lib/logger/index.ts";
import { TermlinkError } from "./base.ts";

export function handleCommandError(error: unknown, cmdLog: CommandLogger): void {
  cmdLog.error(error instanceof Error ? error : String(error));
  cmdLog.emit();

  // The wide event already carries the error in JSON mode.
  if (getOutputMode() === "json") {
    return;
  }

  if (error instanceof EvlogError) {
    const parts = [error.message];
    if (error.why) parts.push(`  Why: ${error.why}`);
    if (error.fix) parts.push(`  Fix: ${error.fix}`);
    if (error instanceof TermlinkError && getOutputMode() === "verbose") {
      parts.push(`  Code: ${error.code}`);
    }
    consola.error(parts.join("\n"));
  } else {
    consola.error(error instanceof Error ? error.message : String(error));
  }
}
