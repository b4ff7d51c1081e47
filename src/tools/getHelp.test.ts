import { describe, expect, it } from "vitest";
import {
  HELP_CASCADE,
  HELP_EXAMPLES,
  HELP_SCHEMA,
  HELP_USAGE,
} from "../resources/helpContent.js";
import { createGetHelpHandler } from "./getHelp.js";

describe("salvage_get_help", () => {
  it("returns usage by default", async () => {
    const handler = createGetHelpHandler();
    const result = await handler({});

    expect(result.content[0]?.text).toBe(HELP_USAGE);
  });

  it("returns each topic", async () => {
    const handler = createGetHelpHandler();

    expect((await handler({ topic: "overview" })).content[0]?.text).toBe(HELP_USAGE);
    expect((await handler({ topic: "schema" })).content[0]?.text).toBe(HELP_SCHEMA);
    expect((await handler({ topic: "cascade" })).content[0]?.text).toBe(HELP_CASCADE);
    expect((await handler({ topic: "examples" })).content[0]?.text).toBe(HELP_EXAMPLES);
  });

  it("lists the parser tools in the usage text", async () => {
    const result = await createGetHelpHandler()({});
    expect(result.content[0]?.text).toContain("salvage_parse_record");
    expect(result.content[0]?.text).toContain("salvage_repair_json");
  });
});
