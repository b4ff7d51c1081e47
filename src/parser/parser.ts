import { EmptyInputError, ParsingError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isRecord } from "../utils/typeGuards.js";
import { healAndValidate } from "./heal.js";
import { isolateCandidate } from "./isolate.js";
import { normalizeCandidate } from "./normalize.js";
import { createParserPatterns, type ParserPatterns } from "./patterns.js";
import { decodeJson } from "./repair.js";
import { err, ok, type Result } from "./result.js";
import type { Schema } from "./schema.js";
import { extractSemantic } from "./semantic.js";
import type { KeyMatchPolicy, ParseOutcome, ValidatedRecord } from "./types.js";

export type RecordParserOptions = {
  /** Which occurrence of a repeated key wins during prose extraction. */
  keyMatch?: KeyMatchPolicy;
  /** Rejects longer inputs before any layer runs. */
  maxInputChars?: number;
  logger?: Logger;
};

export type RepairReport = {
  candidate: string;
  decodes: boolean;
  repaired: boolean;
  error?: string;
};

type StructuralSuccess = { record: ValidatedRecord; repaired: boolean };

/**
 * Extracts a schema-conformant record from messy text. Structural decoding
 * (isolate, normalize, repair, heal, validate) runs first; prose extraction
 * over the raw text is the fallback. Instances hold no per-call state and
 * can be shared.
 */
export class RecordParser {
  private readonly patterns: ParserPatterns;
  private readonly keyMatch: KeyMatchPolicy;
  private readonly maxInputChars: number | undefined;
  private readonly logger: Logger;

  constructor(opts: RecordParserOptions = {}) {
    this.patterns = createParserPatterns();
    this.keyMatch = opts.keyMatch ?? "first";
    this.maxInputChars = opts.maxInputChars;
    this.logger = opts.logger ?? silentLogger;
  }

  parse(raw: string, schema: Schema): ValidatedRecord {
    return this.parseDetailed(raw, schema).record;
  }

  parseDetailed(raw: string, schema: Schema): ParseOutcome {
    this.checkInput(raw);

    const structural = this.parseStructural(raw, schema);
    if (structural.ok) {
      return { record: structural.value.record, layer: "structural", repaired: structural.value.repaired };
    }
    this.logger.debug("Structural layer failed; falling back to semantic extraction", {
      error: structural.error,
    });

    const semantic = this.parseSemantic(raw, schema);
    if (semantic.ok) {
      return { record: semantic.value, layer: "semantic", repaired: false };
    }
    this.logger.debug("Semantic layer failed", { error: semantic.error });

    throw new ParsingError("Failed after all layers.", {
      final_error: semantic.error,
      structural_error: structural.error,
    });
  }

  /** Runs isolation, normalization and repair only, without a schema. */
  repairCandidate(raw: string): RepairReport {
    this.checkInput(raw);
    const candidate = normalizeCandidate(isolateCandidate(raw, this.patterns), this.patterns);
    const decoded = decodeJson(candidate);
    if (decoded.ok) {
      return { candidate: decoded.value.text, decodes: true, repaired: decoded.value.repaired };
    }
    return { candidate, decodes: false, repaired: false, error: decoded.error };
  }

  private checkInput(raw: string): void {
    if (!raw.trim()) throw new EmptyInputError();
    if (this.maxInputChars !== undefined && raw.length > this.maxInputChars) {
      throw new ParsingError(`Input exceeds ${this.maxInputChars} characters.`, {
        input_chars: String(raw.length),
        max_input_chars: String(this.maxInputChars),
      });
    }
  }

  private parseStructural(raw: string, schema: Schema): Result<StructuralSuccess> {
    const candidate = normalizeCandidate(isolateCandidate(raw, this.patterns), this.patterns);
    const decoded = decodeJson(candidate);
    if (!decoded.ok) return decoded;
    if (!isRecord(decoded.value.value)) {
      return err("Decoded JSON is not an object.");
    }
    const validated = healAndValidate(decoded.value.value, schema);
    if (!validated.ok) return validated;
    return ok({ record: validated.value, repaired: decoded.value.repaired });
  }

  private parseSemantic(raw: string, schema: Schema): Result<ValidatedRecord> {
    const extracted = extractSemantic(raw, schema, {
      patterns: this.patterns,
      keyMatch: this.keyMatch,
    });
    if (!extracted.ok) return extracted;
    return healAndValidate(extracted.value, schema);
  }
}
