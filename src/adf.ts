export interface AdfDocument {
  type: "doc";
  version: 1;
  content: Array<{
    type: "paragraph";
    content: Array<{ type: "text"; text: string }>;
  }>;
}

/** One paragraph per input line; blank lines become empty paragraphs. */
export function plainTextToAdf(text: string): AdfDocument {
  const lines = text.replace(/\r\n/g, "\n").split("\n");

  return {
    type: "doc",
    version: 1,
    content: lines.map((line) => ({
      type: "paragraph",
      content: line ? [{ type: "text", text: line }] : []
    }))
  };
}
