import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors/index.ts";
import { DEFAULT_MAX_PAYLOAD } from "../../src/lib/protocol/reader.ts";
import { loadClientConfig, loadServerConfig, parsePort, parseTarget } from "../../src/config.ts";

describe("loadServerConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadServerConfig({}, { HOME: "/home/test" })).toEqual({
      host: "0.0.0.0",
      port: 7070,
      handshakeTimeoutMs: 5000,
      maxPayload: DEFAULT_MAX_PAYLOAD,
      cwd: "/home/test",
    });
  });

  it("reads TERMLINK_* variables", () => {
    const config = loadServerConfig(
      {},
      {
        HOME: "/home/test",
        TERMLINK_HOST: "127.0.0.1",
        TERMLINK_PORT: "7071",
        TERMLINK_TOKEN: "test-secret",
        TERMLINK_SHELL: "/bin/zsh",
        TERMLINK_MAX_FRAME: "1024",
      },
    );
    expect(config).toMatchObject({
      host: "127.0.0.1",
      port: 7071,
      token: "test-secret",
      shell: "/bin/zsh",
      maxPayload: 1024,
    });
  });

  it("lets flags win over the environment", () => {
    const config = loadServerConfig(
      { host: "::1", port: "9000", token: "flag-secret" },
      { TERMLINK_HOST: "127.0.0.1", TERMLINK_PORT: "7071", TERMLINK_TOKEN: "test-secret" },
    );
    expect(config).toMatchObject({ host: "::1", port: 9000, token: "flag-secret" });
  });

  it("names TERMLINK_MAX_FRAME when it is not a byte count", () => {
    expect(() => loadServerConfig({}, { TERMLINK_MAX_FRAME: "16M" })).toThrow(
      'Invalid TERMLINK_MAX_FRAME: "16M". Must be an integer between 1 and 4294967295.',
    );
    expect(() => loadServerConfig({}, { TERMLINK_MAX_FRAME: "0" })).toThrow(ValidationError);
  });

  it("treats an empty token as no token", () => {
    expect(loadServerConfig({ token: "" }, { TERMLINK_TOKEN: "  " }).token).toBeUndefined();
  });

  it("rejects a bad port", () => {
    expect(() => loadServerConfig({ port: "70000" }, {})).toThrow(ValidationError);
    expect(() => loadServerConfig({}, { TERMLINK_PORT: "http" })).toThrow(
      'Invalid --port: "http". Must be a port between 0 and 65535.',
    );
  });
});

describe("parsePort", () => {
  it("accepts the full range", () => {
    expect(parsePort("port", "0")).toBe(0);
    expect(parsePort("port", "65535")).toBe(65535);
  });

  it("rejects fractions and signs", () => {
    for (const value of ["1.5", "-1", "+80", ""]) {
      expect(() => parsePort("port", value)).toThrow(ValidationError);
    }
  });
});

describe("parseTarget", () => {
  it("splits tcp URLs", () => {
    expect(parseTarget("tcp://example.test:9000")).toEqual({ host: "example.test", port: 9000 });
  });

  it("accepts a bare host:port and defaults the port", () => {
    expect(parseTarget("localhost:7071")).toEqual({ host: "localhost", port: 7071 });
    expect(parseTarget("tcp://example.test")).toEqual({ host: "example.test", port: 7070 });
  });

  it("strips IPv6 brackets", () => {
    expect(parseTarget("tcp://[::1]:7070")).toEqual({ host: "::1", port: 7070 });
  });

  it("rejects other schemes", () => {
    expect(() => parseTarget("http://example.test")).toThrow('Invalid --url: "http://example.test". Expected tcp://host:port.');
  });
});

describe("loadClientConfig", () => {
  it("defaults to the local daemon", () => {
    expect(loadClientConfig({}, {})).toEqual({ host: "127.0.0.1", port: 7070 });
  });

  it("prefers --url over host and port", () => {
    expect(loadClientConfig({ url: "tcp://example.test:9000", host: "other", port: "1" }, {})).toEqual({
      host: "example.test",
      port: 9000,
    });
  });

  it("carries the token and a non-empty command", () => {
    expect(loadClientConfig({ cmd: ["ls", "-la"] }, { TERMLINK_TOKEN: "test-secret" })).toEqual({
      host: "127.0.0.1",
      port: 7070,
      token: "test-secret",
      cmd: ["ls", "-la"],
    });
    expect(loadClientConfig({ cmd: [] }, {}).cmd).toBeUndefined();
  });
});
