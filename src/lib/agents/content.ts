interface TextBlock {
  type: "text";
  text: string;
}

function isTextBlock(block: unknown): block is TextBlock {
  return (
    typeof block === "object" &&
    block !== null &&
    "type" in block &&
    block.type === "text" &&
    "text" in block &&
    typeof block.text === "string"
  );
}

/** Plain text of a chat model reply; non-text blocks are dropped. */
export function extractTextContent(content: string | unknown[]): string {
  if (typeof content === "string") return content;
  return content.filter(isTextBlock).map((b) => b.text).join("");
}

// Models sometimes wrap JSON in markdown fences despite instructions
export function stripCodeFences(text: string): string {
  return text
    .replace(/```json\s*/g, "")
    .replace(/```\s*/g, "")
    .trim();
}

/** Parses a JSON object reply; null when the text is not one. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}
