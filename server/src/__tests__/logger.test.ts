import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "../logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createConsoleLogger({ level: "warn" });
    logger.debug("hidden");
    logger.warn("shown", { campaignId: "camp-1" });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("shown", { campaignId: "camp-1" });
  });

  it("prefixes child scopes", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createConsoleLogger({ scope: "server" }).child("combat").info("Combat started");
    expect(log).toHaveBeenCalledWith("[server:combat] Combat started");
  });
});
