import { describe, expect, it } from "vitest";
import type { SalvageConfig } from "../config.js";
import { buildCapabilities } from "./capabilities.js";

describe("buildCapabilities", () => {
  it("describes tools, kinds and the active limits", () => {
    const config: SalvageConfig = {
      parser: { keyMatch: "last" },
      limits: { maxInputChars: 2000, maxSchemaFields: 20 },
      logging: { debug: false },
    };
    const caps = buildCapabilities(config, { name: "record-salvage", version: "0.1.0" });

    expect(caps.server).toEqual({ name: "record-salvage", version: "0.1.0" });
    expect(caps.tools).toEqual(["salvage_parse_record", "salvage_repair_json", "salvage_get_help"]);
    expect(caps.prompts).toEqual(["structured_record"]);
    expect(caps.fieldKinds).toEqual(["string", "integer", "float", "boolean", "list", "dict", "any"]);
    expect(caps.typeNames.int).toBe("integer");
    expect(caps.flattenKeys[0]).toBe("value");
    expect(caps.keyMatch).toBe("last");
    expect(caps.limits).toEqual({ maxInputChars: 2000, maxSchemaFields: 20 });
  });
});
