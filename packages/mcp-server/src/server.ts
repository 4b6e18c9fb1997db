import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerMethodTools } from "./tools/methods.js";
import { registerCompanyTools } from "./tools/company.js";
import { registerPortfolioTools } from "./tools/portfolio.js";
import type { ToolContext } from "./context.js";

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: "ip-valuation-mcp",
    version: "0.1.0",
  });

  registerMethodTools(server, ctx);
  registerCompanyTools(server, ctx);
  registerPortfolioTools(server, ctx);

  return server;
}
