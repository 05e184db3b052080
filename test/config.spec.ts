import { afterEach, describe, expect, it, vi } from "vitest";
import { getGraphConfig, Module, resetGraphConfig, setGraphConfig } from "../src";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  resetGraphConfig();
});

describe("graph config", () => {
  it("reads the environment", () => {
    vi.stubEnv("TENSORGRAPH_DEBUG", "1");
    vi.stubEnv("TENSORGRAPH_SEED", "7");
    vi.stubEnv("TENSORGRAPH_VERIFY_DUMP", "0");
    resetGraphConfig();
    expect(getGraphConfig()).toEqual({ debug: true, seed: 7, verifyDump: false });
  });

  it("defaults when the variables are unset", () => {
    vi.stubEnv("TENSORGRAPH_DEBUG", "");
    vi.stubEnv("TENSORGRAPH_SEED", "");
    vi.stubEnv("TENSORGRAPH_VERIFY_DUMP", "");
    resetGraphConfig();
    expect(getGraphConfig()).toEqual({ debug: false, seed: 0, verifyDump: true });
  });

  it("warns about a malformed seed", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("TENSORGRAPH_SEED", "abc");
    resetGraphConfig();
    expect(getGraphConfig().seed).toBe(0);
    expect(warn).toHaveBeenCalledWith('[tensorgraph:config] ignoring non-integer TENSORGRAPH_SEED="abc"');
  });

  it("overrides individual fields", () => {
    setGraphConfig({ seed: 5 });
    setGraphConfig({ debug: true });
    expect(getGraphConfig().seed).toBe(5);
    expect(getGraphConfig().debug).toBe(true);
  });

  it("traces mutations in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    setGraphConfig({ debug: true });
    const m = new Module();
    m.createFunction("main");
    m.createVariable({ elemKind: "float", dims: [2], name: "x" });
    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "[tensorgraph:module] created function main",
      "[tensorgraph:module] created variable x__0 : float<2>",
    ]);
  });

  it("stays quiet otherwise", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    setGraphConfig({ debug: false });
    new Module().createFunction("main");
    expect(log).not.toHaveBeenCalled();
  });
});
