/** Text helpers shared by the templates */

export const GENERATED_NOTICE = "Generated from the business ontology. Do not edit by hand.";

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char);
}

/** Escape a value for a Markdown table cell */
export function mdCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function indent(text: string, spaces: number): string {
  const pad = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => (line ? pad + line : line))
    .join("\n");
}

/** Display form of a free-form metadata value */
export function displayValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(displayValue).join(", ");
  return JSON.stringify(value) ?? String(value);
}

/** Join non-empty blocks with a blank line and end with a newline */
export function joinBlocks(blocks: string[]): string {
  return blocks.filter((b) => b.length > 0).join("\n\n") + "\n";
}
