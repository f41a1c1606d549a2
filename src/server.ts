/**
 * MCP server over the stdio transport.
 *
 * Exposes the orchestrator entry points as five tools: start_session,
 * run_deliberation, get_final_decision, get_session, end_session.
 * Sessions live in memory for the lifetime of the process.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Config } from "./config.js";
import { loadConfig, getUserDataDir } from "./config.js";
import { DeliberationOrchestrator } from "./orchestrator.js";
import { UsageMeter } from "./usage.js";
import { createCoordinator, createPanel, type PanelOptions } from "./experts.js";
import { setSensitivePatterns } from "./redaction.js";
import { createLogger, initFileLogging } from "./logger.js";
import {
  TOOL_DEFINITIONS,
  StartSessionInputSchema,
  RunDeliberationInputSchema,
  GetFinalDecisionInputSchema,
  GetSessionInputSchema,
  EndSessionInputSchema,
  createToolHandlers,
} from "./tools.js";

const log = createLogger("server");

export const SERVER_NAME = "consilium";
export const SERVER_VERSION = "0.1.0";

function describe(name: (typeof TOOL_DEFINITIONS)[number]["name"]): string {
  return TOOL_DEFINITIONS.find((t) => t.name === name)?.description ?? name;
}

/** Orchestrator wired from config: shared usage meter, policy and panel size. */
export function createOrchestrator(config: Config, options: Omit<PanelOptions, "usage"> = {}): {
  orchestrator: DeliberationOrchestrator;
  panelOptions: PanelOptions;
} {
  const usage = new UsageMeter();
  const panelOptions: PanelOptions = { ...options, usage };
  const orchestrator = new DeliberationOrchestrator({
    coordinator: createCoordinator(config, panelOptions),
    usage,
    policy: {
      stopOnConsensus: config.deliberation.stopOnConsensus,
      parallel: config.deliberation.parallel,
    },
    defaultPanelSize: config.panel.size,
  });
  return { orchestrator, panelOptions };
}

export function createMcpServer(config: Config, options: Omit<PanelOptions, "usage"> = {}): McpServer {
  const { orchestrator, panelOptions } = createOrchestrator(config, options);
  const handlers = createToolHandlers({
    orchestrator,
    panel: () => createPanel(config, panelOptions),
    config,
  });

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // --- Tool handlers ---

  server.tool(
    "start_session",
    describe("start_session"),
    StartSessionInputSchema.shape,
    async (args) => {
      log.debug("start_session invoked:", args.session_id);
      return handlers.start_session(args);
    }
  );

  server.tool(
    "run_deliberation",
    describe("run_deliberation"),
    RunDeliberationInputSchema.shape,
    async (args) => {
      log.debug("run_deliberation invoked:", args.session_id);
      return handlers.run_deliberation(args);
    }
  );

  server.tool(
    "get_final_decision",
    describe("get_final_decision"),
    GetFinalDecisionInputSchema.shape,
    async (args) => handlers.get_final_decision(args)
  );

  server.tool(
    "get_session",
    describe("get_session"),
    GetSessionInputSchema.shape,
    async (args) => handlers.get_session(args)
  );

  server.tool(
    "end_session",
    describe("end_session"),
    EndSessionInputSchema.shape,
    async (args) => handlers.end_session(args)
  );

  return server;
}

// --- Start ---

export async function startServer(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  initFileLogging(getUserDataDir(config), config.logging);
  const rejected = setSensitivePatterns(config.privacy.sensitivePatterns);
  for (const source of rejected) {
    log.warn("ignoring invalid sensitive pattern:", source);
  }

  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server started (stdio)");
}
