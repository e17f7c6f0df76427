import { describe, expect, it } from "vitest";

import { createLogger } from "../src/logger";

describe("createLogger", () => {
  it("drops messages below the level and prefixes everything but info", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "info", write: (line) => lines.push(line) });

    logger.debug("hidden");
    logger.info("listing streams");
    logger.warn("slow page");
    logger.error("write failed");

    expect(lines).toEqual(["listing streams", "warn: slow page", "error: write failed"]);
  });

  it("keeps debug output at the debug level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", write: (line) => lines.push(line) });

    logger.debug("sync state DIFF");

    expect(lines).toEqual(["debug: sync state DIFF"]);
  });
});
