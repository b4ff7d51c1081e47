import { describe, expect, it } from "vitest";
import { createStderrLogger } from "./logger.js";

describe("createStderrLogger", () => {
  function capture(debugEnabled: boolean) {
    const lines: string[] = [];
    const logger = createStderrLogger({ debugEnabled, write: (line) => lines.push(line) });
    return { logger, lines };
  }

  it("formats level, message and meta on one line", () => {
    const { logger, lines } = capture(false);
    logger.info("Server running on stdio", { name: "record-salvage" });
    expect(lines).toEqual(['[info] Server running on stdio {"name":"record-salvage"}\n']);
  });

  it("drops debug lines unless enabled", () => {
    const quiet = capture(false);
    quiet.logger.debug("hidden");
    expect(quiet.lines).toEqual([]);

    const verbose = capture(true);
    verbose.logger.debug("shown");
    expect(verbose.lines).toEqual(["[debug] shown\n"]);
  });

  it("redacts secrets in messages and meta", () => {
    const { logger, lines } = capture(false);
    logger.error("Authorization: Bearer test-secret", { apiKey: "test-secret", detail: "ok" });
    expect(lines).toEqual([
      '[error] Authorization: Bearer [redacted] {"apiKey":"[redacted]","detail":"ok"}\n',
    ]);
  });
});
