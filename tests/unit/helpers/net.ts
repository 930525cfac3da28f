import { connect, type Socket } from "node:net";
import { createTermlinkServer } from "../../../src/context.ts";
import type { ServerConfig } from "../../../src/config.ts";
import type { TermlinkHooks } from "../../../src/hooks.ts";
import type { Listener } from "../../../src/lib/server/listener.ts";
import { MsgData, type Frame } from "../../../src/lib/protocol/frame.ts";
import { FrameReader } from "../../../src/lib/protocol/reader.ts";
import { createSilentLogger } from "../../../src/termlink-logger.ts";
import { createFakePtyFactory, type FakePty } from "./fake-pty.ts";

type HookParams<K extends keyof TermlinkHooks> = Parameters<TermlinkHooks[K]>[0];

export interface HookLog {
  start: HookParams<"session:start">[];
  resize: HookParams<"session:resize">[];
  end: HookParams<"session:end">[];
  reject: HookParams<"handshake:reject">[];
}

export interface TestServer {
  server: Listener;
  port: number;
  spawned: FakePty[];
  events: HookLog;
}

export const TEST_ENV: NodeJS.ProcessEnv = {
  PATH: process.env.PATH,
  SHELL: "/bin/sh",
  HOME: "/tmp",
};

export async function startServer(config: Partial<ServerConfig> = {}): Promise<TestServer> {
  const { factory, spawned } = createFakePtyFactory();
  const server = await createTermlinkServer({
    config: { host: "127.0.0.1", port: 0, ...config },
    ptyFactory: factory,
    logger: createSilentLogger(),
    env: TEST_ENV,
  });
  const address = await server.listen();

  const events: HookLog = { start: [], resize: [], end: [], reject: [] };
  server.ctx.hooks.hook("session:start", (params) => {
    events.start.push(params);
  });
  server.ctx.hooks.hook("session:resize", (params) => {
    events.resize.push(params);
  });
  server.ctx.hooks.hook("session:end", (params) => {
    events.end.push(params);
  });
  server.ctx.hooks.hook("handshake:reject", (params) => {
    events.reject.push(params);
  });

  return { server, port: address.port, spawned, events };
}

export interface TestClient {
  socket: Socket;
  send: (bytes: Buffer) => void;
  next: () => Promise<Frame>;
  /** Data payloads received so far, concatenated. */
  readonly output: string;
  /** Read frames until the concatenated Data output contains `text`. */
  waitForOutput: (text: string) => Promise<string>;
  /** Read every remaining frame until the server closes the socket. */
  drain: () => Promise<Frame[]>;
}

export function openClient(port: number): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host: "127.0.0.1", port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      socket.on("error", () => {});
      const reader = new FrameReader(socket);
      let output = "";

      const next = async () => {
        const frame = await reader.read();
        if (frame.type === MsgData) output += frame.payload.toString("utf8");
        return frame;
      };

      resolve({
        socket,
        send: (bytes) => socket.write(bytes),
        next,
        get output() {
          return output;
        },
        waitForOutput: async (text) => {
          while (!output.includes(text)) await next();
          return output;
        },
        drain: async () => {
          const frames: Frame[] = [];
          for (;;) {
            try {
              frames.push(await next());
            } catch {
              return frames;
            }
          }
        },
      });
    });
  });
}
