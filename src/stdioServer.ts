#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createFileBackedService } from "./pomodoro.js";
import { createPomodoroServer } from "./server.js";

async function bootstrap() {
  const { server } = createPomodoroServer(createFileBackedService());
  const transport = new StdioServerTransport();

  const shutdown = async () => {
    try {
      await server.close();
    } catch (error) {
      console.error("Error closing pomodoro MCP server", error);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await server.connect(transport);
  // stdout carries the protocol; diagnostics go to stderr.
  console.error("marinara MCP server listening on stdio");
}

bootstrap().catch(error => {
  console.error("Failed to start marinara MCP server", error);
  process.exit(1);
});
