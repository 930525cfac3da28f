import { createServer } from "node:net";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../../src/errors/index.ts";
import type { Listener } from "../../src/lib/server/listener.ts";
import { TerminalBridge } from "../../src/lib/shell/client.ts";
import type { ServerConfig } from "../../src/config.ts";
import { startServer, type TestServer } from "./helpers/net.ts";

const servers: Listener[] = [];

async function serve(config: Partial<ServerConfig> = {}): Promise<TestServer> {
  const started = await startServer(config);
  servers.push(started.server);
  return started;
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map((s) => s.close()));
});

function collect(stream: PassThrough): { text: string } {
  const sink = { text: "" };
  stream.on("data", (chunk: Buffer) => {
    sink.text += chunk.toString("utf8");
  });
  return sink;
}

function fakeTerminal(options: { tty?: boolean } = {}) {
  const setRawMode = vi.fn((mode: boolean) => mode);
  const input = Object.assign(new PassThrough(), { isTTY: options.tty ?? true, isRaw: false, setRawMode });
  const output = Object.assign(new PassThrough(), { rows: 24, columns: 80 });
  const errorOutput = new PassThrough();
  return {
    io: { input, output, errorOutput },
    setRawMode,
    out: collect(output),
    err: collect(errorOutput),
  };
}

function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = createServer();
    probe.once("error", reject);
    probe.listen(0, "127.0.0.1", () => {
      const addr = probe.address();
      const port = addr && typeof addr === "object" ? addr.port : 0;
      probe.close(() => resolve(port));
    });
  });
}

describe("TerminalBridge", () => {
  it("bridges a shell session and restores the terminal on exit", async () => {
    const srv = await serve();
    const term = fakeTerminal();
    const bridge = new TerminalBridge({ host: "127.0.0.1", port: srv.port, io: term.io });
    const result = bridge.run();

    await vi.waitFor(() => expect(srv.events.start).toHaveLength(1));
    expect(srv.events.start[0]).toMatchObject({ argv: ["/bin/sh", "-l"], rows: 24, cols: 80 });
    expect(term.setRawMode.mock.calls).toEqual([[true]]);

    term.io.input.write("echo hello\n");
    await vi.waitFor(() => expect(term.out.text).toBe("hello\r\n"));

    term.io.input.write("exit\n");
    expect(await result).toEqual({ reason: "server-exit", errors: [] });
    expect(term.setRawMode.mock.calls).toEqual([[true], [false]]);
    expect(bridge.close()).toBe(false);
  });

  it("sends the token and remote command in the handshake", async () => {
    const srv = await serve({ token: "test-secret" });
    const term = fakeTerminal();
    const bridge = new TerminalBridge({
      host: "127.0.0.1",
      port: srv.port,
      token: "test-secret",
      cmd: ["ls", "-la"],
      io: term.io,
    });
    const result = bridge.run();

    await vi.waitFor(() => expect(srv.events.start).toHaveLength(1));
    expect(srv.events.start[0]?.argv).toEqual(["ls", "-la"]);
    expect(bridge.close()).toBe(true);
    expect(await result).toEqual({ reason: "interrupted", errors: [] });
    await vi.waitFor(() => expect(srv.events.end).toEqual([expect.objectContaining({ reason: "client-exit" })]));
  });

  it("prints server errors and restores the terminal", async () => {
    const srv = await serve({ token: "test-secret" });
    const term = fakeTerminal();
    const bridge = new TerminalBridge({ host: "127.0.0.1", port: srv.port, io: term.io });

    expect(await bridge.run()).toEqual({ reason: "disconnected", errors: ["unauthorized"] });
    expect(term.err.text).toBe("unauthorized\r\n");
    expect(term.setRawMode.mock.calls).toEqual([[true], [false]]);
    expect(srv.spawned).toHaveLength(0);
  });

  it("forwards local window size changes", async () => {
    const srv = await serve();
    const term = fakeTerminal();
    const bridge = new TerminalBridge({ host: "127.0.0.1", port: srv.port, io: term.io });
    const result = bridge.run();
    await vi.waitFor(() => expect(srv.events.start).toHaveLength(1));

    term.io.output.rows = 40;
    term.io.output.columns = 120;
    term.io.output.emit("resize");

    await vi.waitFor(() => expect(srv.events.resize).toHaveLength(1));
    expect(srv.events.resize[0]).toMatchObject({ rows: 40, cols: 120 });
    expect(srv.spawned[0]?.resizes).toEqual([[120, 40]]);
    bridge.close();
    await result;
  });

  it("leaves a non-terminal input alone and ends when it closes", async () => {
    const srv = await serve();
    const term = fakeTerminal({ tty: false });
    const bridge = new TerminalBridge({ host: "127.0.0.1", port: srv.port, io: term.io });
    const result = bridge.run();
    await vi.waitFor(() => expect(srv.events.start).toHaveLength(1));

    term.io.input.end();
    expect(await result).toEqual({ reason: "input-closed", errors: [] });
    expect(term.setRawMode).not.toHaveBeenCalled();
  });

  it("fails with a transport error when nothing listens", async () => {
    const port = await freePort();
    const term = fakeTerminal();
    const bridge = new TerminalBridge({ host: "127.0.0.1", port, io: term.io });

    const error = await bridge.run().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: "ERR_TRANSPORT_CONNECT" });
    expect(term.setRawMode).not.toHaveBeenCalled();
  });

  it("falls back to 24x80 when the output is not a terminal", () => {
    const bridge = new TerminalBridge({ host: "127.0.0.1", port: 7070, io: { output: new PassThrough() } });
    expect(bridge.querySize()).toEqual({ rows: 24, cols: 80 });
  });
});
