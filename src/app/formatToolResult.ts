import type { ToolCallOutcome, ToolContent } from "../ports/mcp/ToolServerPort";

export const EMPTY_RESULT_TEXT = "(empty result)";

function formatContent(block: ToolContent): string {
  switch (block.type) {
    case "text":
      return block.text;
    case "image":
    case "audio":
      // size is the length of the base64 payload, not decoded bytes
      return `[${block.type} ${block.mimeType} ${block.data.length} bytes]`;
    case "resource":
      return block.text ?? `[resource ${block.uri}]`;
    case "other":
      return JSON.stringify(block.value) ?? String(block.value);
  }
}

/**
 * Flattens a tool result into the plain text handed back to the model and
 * shown to the user: structured content first, then each content block.
 */
export function formatToolResult(result: ToolCallOutcome): string {
  const parts: string[] = [];
  if (result.structuredContent && Object.keys(result.structuredContent).length) {
    parts.push(JSON.stringify(result.structuredContent, null, 2));
  }
  for (const block of result.content) {
    parts.push(formatContent(block));
  }
  const text = parts.filter((part) => part.length > 0).join("\n");
  return text || EMPTY_RESULT_TEXT;
}
