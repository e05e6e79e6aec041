/**
 * CLI Entry Point - parse and simplify one expression
 *
 * Usage:
 *   tsx src/cli.ts "2x^2 + 3x - 1"
 *   echo "1/3 + 1/6" | tsx src/cli.ts
 *
 * Prints the canonical form and the simplified form; exits 1 on a parse error.
 */

import { pathToFileURL } from "node:url";
import { config } from "./config.ts";
import {
  constantValue,
  formatLatex,
  formatParseError,
  formatRational,
  isLatexParseError,
  parseLatex,
  simplify,
} from "./lib/latex/index.ts";

export interface CliOutput {
  exitCode: number;
  lines: string[];
}

/** Run the CLI on one expression; stdout lines on success, a diagnostic on failure */
export function runCli(input: string, maxDepth: number = config.maxDepth): CliOutput {
  const expression = input.replace(/\r?\n$/, "");
  try {
    const ast = parseLatex(expression, { maxDepth });
    const simplified = simplify(ast);
    const lines = [`Parsed:     ${formatLatex(ast)}`, `Simplified: ${formatLatex(simplified)}`];
    const value = constantValue(simplified);
    if (value) lines.push(`Value:      ${formatRational(value)}`);
    return { exitCode: 0, lines };
  } catch (error) {
    if (isLatexParseError(error)) {
      return { exitCode: 1, lines: formatParseError(expression, error).split("\n") };
    }
    throw error;
  }
}

async function readStdin(): Promise<string> {
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const input = args.length > 0 ? args.join(" ") : await readStdin();
  const { exitCode, lines } = runCli(input);
  const write = exitCode === 0 ? console.log : console.error;
  for (const line of lines) write(line);
  process.exitCode = exitCode;
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
