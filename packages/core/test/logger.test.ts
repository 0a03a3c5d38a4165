import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "../src";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    setLogLevel("info");
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("ledger").info("decision recorded", { entityId: "ent_1" });
    expect(spy).toHaveBeenCalledWith("[ledger]", "decision recorded", {
      entityId: "ent_1"
    });
  });

  it("drops messages below the configured level", () => {
    setLogLevel("warn");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("scan");
    logger.info("hidden");
    logger.warn("shown");
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[scan]", "shown");
  });

  it("nests child scopes", () => {
    setLogLevel("error");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const child = createLogger("api").child("talks");
    expect(child.scope).toBe("api:talks");
    child.error("boom");
    expect(spy).toHaveBeenCalledWith("[api:talks]", "boom");
  });

  it("is silent at level silent", () => {
    setLogLevel("silent");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("x").error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });
});
