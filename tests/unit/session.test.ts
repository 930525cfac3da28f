import { describe, expect, it, vi } from "vitest";
import { SessionError } from "../../src/errors/index.ts";
import { PtySession } from "../../src/lib/pty/session.ts";
import type { PtyFactory } from "../../src/lib/pty/types.ts";
import { createFakePtyFactory, type FakePty } from "./helpers/fake-pty.ts";

function spawnSession(argv = ["/bin/sh", "-l"]): { session: PtySession; pty: FakePty } {
  const { factory, spawned } = createFakePtyFactory();
  const session = PtySession.spawn(factory, argv, { rows: 24, cols: 80, env: { TERM: "xterm-256color" }, cwd: "/tmp" });
  const [pty] = spawned;
  if (!pty) throw new Error("factory was not called");
  return { session, pty };
}

const noop = { onData: () => {}, onEnd: () => {} };

describe("PtySession.spawn", () => {
  it("hands argv, size and environment to the factory", () => {
    const { session, pty } = spawnSession(["/bin/bash", "-lc", "echo hi"]);
    expect(pty.file).toBe("/bin/bash");
    expect(pty.args).toEqual(["-lc", "echo hi"]);
    expect(pty.options).toEqual({ rows: 24, cols: 80, env: { TERM: "xterm-256color" }, cwd: "/tmp" });
    expect(session.state).toBe("created");
    expect(session.pid).toBe(pty.pid);
  });

  it("wraps factory failures", () => {
    const factory: PtyFactory = () => {
      throw new Error("boom");
    };
    const spawn = () => PtySession.spawn(factory, ["/nope"], { rows: 24, cols: 80 });
    expect(spawn).toThrow(SessionError);
    expect(spawn).toThrow("failed to start session: boom");
  });

  it("refuses an empty argv", () => {
    const { factory } = createFakePtyFactory();
    expect(() => PtySession.spawn(factory, [], { rows: 24, cols: 80 })).toThrow("failed to start session: empty command");
  });
});

describe("PtySession", () => {
  it("forwards PTY output as bytes once started", () => {
    const { session, pty } = spawnSession();
    const onData = vi.fn();
    session.start({ onData, onEnd: () => {} });
    expect(session.state).toBe("active");

    pty.emitData("héllo");
    expect(onData).toHaveBeenCalledTimes(1);
    expect(onData.mock.calls[0]?.[0]).toEqual(Buffer.from("héllo", "utf8"));
  });

  it("cannot be started twice", () => {
    const { session } = spawnSession();
    session.start(noop);
    expect(() => session.start(noop)).toThrow("PTY session is active");
  });

  it("writes input bytes to the PTY unchanged", () => {
    const { session, pty } = spawnSession();
    session.start(noop);
    session.write(Buffer.from([0xe9, 0x0a]));
    session.write(Buffer.from([0x1b, 0xff]));
    expect(pty.written.map((chunk) => [...chunk])).toEqual([
      [0xe9, 0x0a],
      [0x1b, 0xff],
    ]);
  });

  it("forwards output bytes that are not UTF-8 unchanged", () => {
    const { session, pty } = spawnSession();
    const chunks: Buffer[] = [];
    session.start({ onData: (chunk) => chunks.push(chunk), onEnd: () => {} });
    pty.emitData(Buffer.from([0xe9, 0x0d, 0x0a]));
    expect(chunks.map((chunk) => [...chunk])).toEqual([[0xe9, 0x0d, 0x0a]]);
  });

  it("turns a failing write into a session error", () => {
    const { session, pty } = spawnSession();
    session.start(noop);
    pty.write = () => {
      throw new Error("EIO");
    };
    expect(() => session.write(Buffer.from("x"))).toThrow("PTY write failed: EIO");
    expect(session.state).toBe("closing");
  });

  it("applies a resize and records the new size", () => {
    const { session, pty } = spawnSession();
    session.start(noop);
    expect(session.resize(40, 120)).toBe(true);
    expect(pty.resizes).toEqual([[120, 40]]);
    expect(session.size).toEqual({ rows: 40, cols: 120 });
  });

  it("ignores non-positive and out-of-range sizes", () => {
    const { session, pty } = spawnSession();
    session.start(noop);
    expect(session.resize(0, 80)).toBe(false);
    expect(session.resize(24, 0x10000)).toBe(false);
    expect(pty.resizes).toEqual([]);
    expect(session.size).toEqual({ rows: 24, cols: 80 });
  });

  it("reports the child exit once", () => {
    const { session, pty } = spawnSession();
    const onEnd = vi.fn();
    session.start({ onData: () => {}, onEnd });
    pty.emitExit(3);
    pty.emitExit(3);
    expect(onEnd).toHaveBeenCalledTimes(1);
    expect(onEnd).toHaveBeenCalledWith({ exitCode: 3 });
  });

  it("tears down exactly once", () => {
    const { session, pty } = spawnSession();
    session.start(noop);

    expect(session.close()).toBe(true);
    expect(session.close()).toBe(false);
    expect(session.state).toBe("closed");
    expect(pty.destroyCalls).toBe(1);
    expect(pty.listenerCount()).toBe(0);
    expect(() => session.write(Buffer.from("x"))).toThrow("PTY session is closed");
    expect(session.resize(40, 120)).toBe(false);
  });

  it("keeps tearing down when closing the master fails", () => {
    const { session, pty } = spawnSession();
    session.start(noop);
    pty.destroy = () => {
      throw new Error("ESRCH");
    };
    expect(session.close()).toBe(true);
    expect(session.state).toBe("closed");
  });

  it("pauses and resumes the PTY only while active", () => {
    const { session, pty } = spawnSession();
    session.pause();
    expect(pty.paused).toBe(false);
    session.start(noop);
    session.pause();
    expect(pty.paused).toBe(true);
    session.resume();
    expect(pty.paused).toBe(false);
  });
});
