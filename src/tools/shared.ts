import type { Context } from "fastmcp";
import { formatParseError, type LatexParseError } from "../lib/latex/index.ts";

type MCPContext = Context<Record<string, unknown> | undefined>;

/** The part of the FastMCP context the tools use */
export type ToolContext = Pick<MCPContext, "log">;

/** Tool output for a failed parse: error kind, offset and a caret under the input */
export function formatFailure(label: string, input: string, error: LatexParseError): string {
  return [`**${label}**`, "```", formatParseError(input, error), "```"].join("\n");
}

export function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}
