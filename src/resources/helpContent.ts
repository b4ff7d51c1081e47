export const HELP_USAGE = `# record-salvage Help

## Quick Start
- Use salvage_parse_record with the raw model output in \`text\` and a field map in \`schema\`.
- Use salvage_repair_json to see what the structural layers make of a payload without a schema.
- Use salvage_get_help for built-in help (topics: overview, schema, cascade, examples).

## Limits
- Input text is capped at limits.maxInputChars (RECORD_SALVAGE_MAX_INPUT_CHARS).
- Schemas are capped at limits.maxSchemaFields (RECORD_SALVAGE_MAX_SCHEMA_FIELDS).

## Logging
- Logs go to stderr only. Set RECORD_SALVAGE_DEBUG=1 to see which layer failed and why.

## Discoverability
- Read salvage://capabilities for tool names, field kinds and active limits.
`;

export const HELP_SCHEMA = `# Schema Definitions

A schema is a JSON object mapping each field name to a type name:

    {"product_name": "str", "version": "float", "is_released": "bool"}

- str: strings only.
- int: integers, or strings holding an integer ("42", "-3"), up to 2^53 - 1 in magnitude.
- float: numbers, or numeric strings ("199.99").
- bool: true/false, t/f, yes/no, y/n, on/off, 1/0.
- list: JSON arrays. dict: JSON objects. any: any value.
- Unknown type names are treated as any.
- Every field is required; extra keys in the input are dropped.
`;

export const HELP_CASCADE = `# How Parsing Works

1. Isolate: take the first \`\`\`json fenced block, else the first "{" through the last "}".
2. Normalize: curly quotes become ASCII quotes; // and /* */ comments are removed.
3. Decode: JSON.parse; on failure, cut the trailing partial token and close open brackets and braces, then try once more.
4. Heal and validate: nested objects in scalar fields are flattened through value, data, text, result, overall, type, sentiment or name; integer fields take the first integer found in their text.
5. Fallback: if all of the above fails, scrape "key: value" pairs from the original text and validate those instead.

When prose repeats a key, the first occurrence wins (RECORD_SALVAGE_KEY_MATCH=last flips this).
`;

export const HELP_EXAMPLES = `# Examples

## Fenced block
text: "Here you go:\\n\`\`\`json\\n{\\"name\\": \\"Ada\\", \\"age\\": 36}\\n\`\`\`"
schema: {"name": "str", "age": "int"}
-> {"name": "Ada", "age": 36}

## Truncated JSON
text: "{\\"id\\": 7, \\"tags\\": [\\"a\\", \\"b\\""
schema: {"id": "int", "tags": "list"}
-> {"id": 7, "tags": ["a", "b"]}

## Prose
text: "Order number 42. Status: \\"in_progress\\". Amount: 199.99."
schema: {"order_number": "int", "status": "str", "amount": "float"}
-> {"order_number": 42, "status": "in_progress", "amount": 199.99}
`;
