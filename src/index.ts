import { FastMCP } from "fastmcp";
import { config } from "./config.ts";
import { compareLatexTool, parseLatexTool, simplifyLatexTool } from "./tools/index.ts";

const server = new FastMCP({
  name: "LaTeX Expression MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(parseLatexTool);
server.addTool(simplifyLatexTool);
server.addTool(compareLatexTool);

async function main(): Promise<void> {
  if (config.transport === "httpStream") {
    await server.start({
      transportType: "httpStream",
      httpStream: { port: config.port },
    });
    console.error(`LaTeX Expression MCP running at http://localhost:${config.port}/mcp`);
    return;
  }

  // stdio for local MCP agents; stdout belongs to the protocol, so logs go to stderr
  await server.start({ transportType: "stdio" });
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
