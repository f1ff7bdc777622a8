import { describe, it, expect, afterEach, vi } from "vitest";
import { ZodError } from "zod";
import { config, parseConnectOptions } from "../apps/client/src/config.js";
import { Logger } from "../apps/client/src/observability/logger.js";
import { initCommand, infoCommand } from "../packages/protocol/src/commands.js";

describe("parseConnectOptions", () => {
  it("fills in defaults", () => {
    expect(parseConnectOptions({ host: "relay.test", password: "test-secret" })).toEqual({
      host: "relay.test",
      port: config.port,
      password: "test-secret",
      tls: false,
      verifyCertificate: true,
      compression: "zlib",
      lines: config.lines,
      onDisconnect: "reset",
      connectTimeout: config.connectTimeout,
    });
  });

  it("rejects passwords that would break the init command", () => {
    expect(() => parseConnectOptions({ host: "relay.test", password: "a,b" })).toThrow(ZodError);
    expect(() => parseConnectOptions({ host: "relay.test", password: "a\nb" })).toThrow(
      "Password must not contain commas or line breaks"
    );
  });

  it("accepts only numeric one-time passwords", () => {
    expect(parseConnectOptions({ host: "h", password: "p", totp: "123456" }).totp).toBe("123456");
    expect(() => parseConnectOptions({ host: "h", password: "p", totp: "12ab56" })).toThrow(
      "One-time password must be 6 to 10 digits"
    );
  });

  it("rejects out of range ports", () => {
    expect(() => parseConnectOptions({ host: "h", password: "p", port: 70000 })).toThrow(ZodError);
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("never writes the init arguments", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger(true).command("session-1", initCommand({ password: "test-secret" }));

    const line = String(log.mock.calls[0]?.[0]);
    expect(line).toMatch(/\[DEBUG\] \[session-1\] → init \{"args":"\*\*\*"\}$/);
    expect(line).not.toContain("test-secret");
  });

  it("writes command ids and arguments in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger(true).command("session-1", infoCommand("version", "req1"));

    expect(String(log.mock.calls[0]?.[0])).toMatch(
      /\[DEBUG\] \[session-1\] → \(req1\) info \{"args":"version"\}$/
    );
  });

  it("stays quiet in debug helpers when debug is off", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger(false).command("session-1", infoCommand("version"));
    new Logger(false).debug("hidden");

    expect(log).not.toHaveBeenCalled();
  });
});
