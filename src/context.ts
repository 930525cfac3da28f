import { createHooks, type Hookable } from "hookable";
import { loadServerConfig, type ServerConfig } from "./config.ts";
import type { TermlinkHooks } from "./hooks.ts";
import type { TermlinkPlugin } from "./plugin.ts";
import type { PtyFactory } from "./lib/pty/types.ts";
import { Listener } from "./lib/server/listener.ts";
import { createDefaultLogger, type TermlinkLogger } from "./termlink-logger.ts";

export interface TermlinkServerOptions {
  config?: Partial<ServerConfig>;
  /** PTY backend; node-pty unless given. */
  ptyFactory?: PtyFactory;
  logger?: TermlinkLogger;
  plugins?: TermlinkPlugin[];
  /** Environment used for shell resolution and passed to sessions. */
  env?: NodeJS.ProcessEnv;
}

export interface TermlinkContext {
  readonly config: ServerConfig;
  readonly hooks: Hookable<TermlinkHooks>;
  readonly logger: TermlinkLogger;
  readonly ptyFactory: PtyFactory;
  readonly env: NodeJS.ProcessEnv;
}

async function loadNodePtyFactory(): Promise<PtyFactory> {
  const { nodePtyFactory } = await import("./lib/pty/factory.ts");
  return nodePtyFactory;
}

export async function createTermlinkServer(options?: TermlinkServerOptions): Promise<Listener> {
  const env = options?.env ?? process.env;
  const config: ServerConfig = { ...loadServerConfig({}, env), ...options?.config };
  const logger = options?.logger ?? createDefaultLogger();
  const hooks = createHooks<TermlinkHooks>();
  const ptyFactory = options?.ptyFactory ?? (await loadNodePtyFactory());

  const ctx: TermlinkContext = { config, hooks, logger, ptyFactory, env };
  const server = new Listener(ctx);

  if (options?.plugins) {
    for (const plugin of options.plugins) {
      await plugin.setup(ctx);
    }
  }

  return server;
}
