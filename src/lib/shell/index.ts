export { TerminalBridge } from "./client.ts";
export type {
  TerminalBridgeOptions,
  TerminalIo,
  TerminalInput,
  TerminalOutput,
  BridgeResult,
  BridgeEndReason,
} from "./client.ts";
export {
  resolveCommand,
  resolveInteractiveShell,
  resolveLoginShell,
  findExecutable,
  childEnv,
} from "./resolve.ts";
export type { ResolveCommandOptions } from "./resolve.ts";
