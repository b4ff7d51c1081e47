export type TextBlock = { type: "text"; text: string };

export function textBlock(text: string): TextBlock {
  return { type: "text", text };
}

export function jsonBlock(value: unknown): TextBlock {
  return textBlock(JSON.stringify(value, null, 2));
}
