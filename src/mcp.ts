#!/usr/bin/env node
import process from "node:process";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./lakegate/config.js";
import { toLakegateError } from "./lakegate/errors.js";
import { createGateway } from "./lakegate/gateway.js";
import type { Gateway } from "./lakegate/gateway.js";
import { ConcurrencyLimiter } from "./lakegate/utils/concurrencyLimiter.js";
import { TOOL_DEFINITIONS, createToolHandlers, toErrorResponse } from "./server/tools.js";

let degradedReason: string | undefined;

/**
 * Log to stderr only (never stdout) to avoid JSON-RPC framing pollution.
 */
function log(msg: string): void {
  process.stderr.write(`[lakegate-mcp] ${msg}\n`);
}

process.on("uncaughtException", (err) => {
  log(`Uncaught exception (server continues): ${err.message}`);
  if (err.stack) log(err.stack);
});

process.on("unhandledRejection", (reason) => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  log(`Unhandled rejection (server continues): ${msg}`);
  if (reason instanceof Error && reason.stack) log(reason.stack);
});

async function main(): Promise<void> {
  let gateway: Gateway | undefined;
  try {
    const config = loadConfig();
    gateway = createGateway(config);
    gateway.start();
    log(`Gateway ready (auth mode: ${config.auth.mode})`);
  } catch (err) {
    // Bad configuration keeps the transport up so the client sees the reason
    const lakegateErr = toLakegateError(err);
    log(`Gateway init failed: ${lakegateErr.message}`);
    degradedReason = lakegateErr.message;
  }

  const limiter = gateway
    ? new ConcurrencyLimiter({
        maxConcurrent: gateway.config.roles.maxConcurrent,
        queueTimeoutMs: gateway.config.roles.timeoutMs
      })
    : undefined;
  const handlers = gateway && limiter ? createToolHandlers(gateway, { limiter }) : undefined;

  const server = new Server(
    { name: "lakegate", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params;

    if (!handlers) {
      return toErrorResponse(
        toLakegateError(new Error(`Server in degraded mode: ${degradedReason ?? "unknown"}`))
      );
    }
    return handlers.call(name, args ?? {});
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("Transport connected, server running");

  await new Promise<void>((resolve) => {
    process.stdin.on("close", () => {
      log("stdin closed, shutting down");
      resolve();
    });
    process.stdin.on("end", () => {
      log("stdin ended, shutting down");
      resolve();
    });
  });

  limiter?.drain("Server shutting down");
  gateway?.stop();
}

main().catch((err) => {
  process.stderr.write(`[lakegate-mcp] Fatal startup error: ${err instanceof Error ? err.message : String(err)}\n`);
  if (err instanceof Error && err.stack) {
    process.stderr.write(`${err.stack}\n`);
  }
  process.exit(1);
});
