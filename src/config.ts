/**
 * Server configuration from the environment
 *
 * Environment:
 *   - LATEX_MAX_DEPTH  - nesting bound for parses (default: 256)
 *   - LATEX_CACHE_SIZE - parse cache capacity, 0 disables (default: 500)
 *   - LATEX_TRANSPORT  - "stdio" or "httpStream" (default: stdio)
 *   - LATEX_PORT       - port for httpStream (default: 8080)
 */

import { z } from "zod";
import { DEFAULT_MAX_DEPTH } from "./lib/latex/index.ts";

export const ConfigSchema = z.object({
  LATEX_MAX_DEPTH: z.coerce.number().int().min(1).max(10_000).default(DEFAULT_MAX_DEPTH),
  LATEX_CACHE_SIZE: z.coerce.number().int().min(0).default(500),
  LATEX_TRANSPORT: z.enum(["stdio", "httpStream"]).default("stdio"),
  LATEX_PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
});

export interface Config {
  maxDepth: number;
  cacheSize: number;
  transport: "stdio" | "httpStream";
  port: number;
}

/**
 * Read configuration from an environment map
 * Throws with every invalid variable listed when validation fails
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join("\n")}`);
  }

  const { LATEX_MAX_DEPTH, LATEX_CACHE_SIZE, LATEX_TRANSPORT, LATEX_PORT } = parsed.data;
  return {
    maxDepth: LATEX_MAX_DEPTH,
    cacheSize: LATEX_CACHE_SIZE,
    transport: LATEX_TRANSPORT,
    port: LATEX_PORT,
  };
}

export const config = loadConfig();
