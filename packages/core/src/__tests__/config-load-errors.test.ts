import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, ConfigError, createLogger } from "../index.js";

const { search } = vi.hoisted(() => ({
  search: vi.fn((): unknown => {
    throw new Error("YAML Error in .tagweaverc");
  }),
}));

vi.mock("cosmiconfig", () => ({
  cosmiconfigSync: () => ({ search }),
}));

describe("config with an unreadable config file", () => {
  beforeEach(() => {
    config.reset();
    search.mockClear();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("raises ConfigError from a full read", () => {
    expect(() => config.get("trace")).toThrow(ConfigError);
    expect(() => config.load()).toThrow("Failed to load tagweave configuration: YAML Error in .tagweaverc");
  });

  it("keeps the cause on the error", () => {
    let error: unknown;
    try {
      config.load();
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it("peeks at defaults without searching for files", () => {
    expect(config.peek("trace")).toBe(false);
    expect(config.peek("diagnostics.context")).toBe(1);
    expect(search).not.toHaveBeenCalled();
  });

  it("peeks at environment variables", () => {
    vi.stubEnv("TAGWEAVE_TRACE", "1");
    expect(config.peek("trace")).toBe(true);
  });

  it("leaves logger debug checks unaffected", () => {
    const lines: string[] = [];
    const log = createLogger("parser", { writer: (_level, line) => lines.push(line) });
    expect(log.debugEnabled).toBe(false);
    log.debug("hidden");
    expect(lines).toEqual([]);
    expect(search).not.toHaveBeenCalled();
  });
});
