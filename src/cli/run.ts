import { AsjpTableError } from "../infrastructure/data/asjp-table.adapter";
import { startMcpServer } from "../interface/mcp/lexical-similarity-server";

export async function runCli(): Promise<void> {
  try {
    await startMcpServer();
  } catch (error) {
    console.error("Failed to start MCP server", error);
    if (error instanceof AsjpTableError) {
      console.error(
        "Set ASJP_DATA_PATH to the tab-separated ASJP word-list table.",
      );
    }
    process.exit(1);
  }
}
