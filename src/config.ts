import { homedir } from "node:os";
import { invalidIntegerEnvError, invalidPortError, invalidUrlError } from "./errors/index.ts";
import { DEFAULT_MAX_PAYLOAD } from "./lib/protocol/reader.ts";

export const DEFAULT_PORT = 7070;
export const DEFAULT_SERVER_HOST = "0.0.0.0";
export const DEFAULT_CLIENT_HOST = "127.0.0.1";
export const HANDSHAKE_TIMEOUT_MS = 5_000;

export interface ServerConfig {
  host: string;
  port: number;
  /** Shared secret; when unset any client is accepted. */
  token?: string;
  /** Shell started for interactive sessions instead of $SHELL. */
  shell?: string;
  handshakeTimeoutMs: number;
  maxPayload: number;
  /** Working directory of spawned sessions. */
  cwd: string;
}

export interface ClientConfig {
  host: string;
  port: number;
  token?: string;
  /** Remote argv; absent means the server's login shell. */
  cmd?: string[];
}

export interface ServerFlags {
  host?: string;
  port?: string;
  token?: string;
  shell?: string;
}

export interface ClientFlags {
  host?: string;
  port?: string;
  url?: string;
  token?: string;
  cmd?: string[];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function parsePort(flag: string, value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw invalidPortError(flag, value);
  }
  return port;
}

/** Integer setting that only comes from the environment, e.g. TERMLINK_MAX_FRAME. */
export function parseIntegerEnv(name: string, value: string, min: number, max: number): number {
  const num = Number(value);
  if (!/^\d+$/.test(value.trim()) || num < min || num > max) {
    throw invalidIntegerEnvError(name, value, min, max);
  }
  return num;
}

/** Server settings: CLI flags over TERMLINK_* variables over defaults. */
export function loadServerConfig(
  flags: ServerFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const port = nonEmpty(flags.port) ?? nonEmpty(env.TERMLINK_PORT);
  const maxFrame = nonEmpty(env.TERMLINK_MAX_FRAME);
  const token = nonEmpty(flags.token) ?? nonEmpty(env.TERMLINK_TOKEN);
  const shell = nonEmpty(flags.shell) ?? nonEmpty(env.TERMLINK_SHELL);

  return {
    host: nonEmpty(flags.host) ?? nonEmpty(env.TERMLINK_HOST) ?? DEFAULT_SERVER_HOST,
    port: port === undefined ? DEFAULT_PORT : parsePort("port", port),
    ...(token !== undefined && { token }),
    ...(shell !== undefined && { shell }),
    handshakeTimeoutMs: HANDSHAKE_TIMEOUT_MS,
    maxPayload:
      maxFrame === undefined
        ? DEFAULT_MAX_PAYLOAD
        : parseIntegerEnv("TERMLINK_MAX_FRAME", maxFrame, 1, 0xffff_ffff),
    cwd: nonEmpty(env.HOME) ?? homedir(),
  };
}

/** Split `tcp://host:port` (or bare `host:port`) into its parts. */
export function parseTarget(url: string): { host: string; port: number } {
  let parsed: URL;
  try {
    parsed = new URL(url.includes("://") ? url : `tcp://${url}`);
  } catch {
    throw invalidUrlError(url);
  }
  if (parsed.protocol !== "tcp:" || !parsed.hostname) {
    throw invalidUrlError(url);
  }
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  return { host, port: parsed.port ? parsePort("url", parsed.port) : DEFAULT_PORT };
}

export function loadClientConfig(
  flags: ClientFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const url = nonEmpty(flags.url);
  const target = url
    ? parseTarget(url)
    : {
        host: nonEmpty(flags.host) ?? nonEmpty(env.TERMLINK_HOST) ?? DEFAULT_CLIENT_HOST,
        port: parsePort("port", nonEmpty(flags.port) ?? nonEmpty(env.TERMLINK_PORT) ?? String(DEFAULT_PORT)),
      };
  const token = nonEmpty(flags.token) ?? nonEmpty(env.TERMLINK_TOKEN);

  return {
    ...target,
    ...(token !== undefined && { token }),
    ...(flags.cmd && flags.cmd.length > 0 && { cmd: flags.cmd }),
  };
}
