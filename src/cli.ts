#!/usr/bin/env node

/**
 * consilium CLI: run expert-panel deliberations from the command line.
 *
 * Commands:
 *   consilium deliberate --case case.json [--image xray.png] [--max-rounds 3]
 *   consilium deliberate --symptoms "..." [--demographics "..."] [--history "..."] [--medications "..."]
 *   consilium experts
 *   consilium init
 *   consilium start
 */

import { parseArgs } from "node:util";
import { randomUUID } from "node:crypto";
import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { loadConfig, getUserDataDir, ConfigSchema, type Config } from "./config.js";
import type { CaseContext } from "./contracts.js";
import { validateCaseContext } from "./contracts.js";
import { buildCaseContext } from "./case-context.js";
import { createCaptioner, loadImage } from "./imaging.js";
import { createPanel } from "./experts.js";
import { resolvePersona } from "./personas.js";
import { createBackend } from "./backends/index.js";
import { createOrchestrator, startServer } from "./server.js";
import type { DeliberationResult } from "./orchestrator.js";
import { totalTokenCount } from "./usage.js";
import { MAX_ROUNDS_LIMIT } from "./session-store.js";
import { InvalidCaseContextError } from "./errors.js";
import { setSensitivePatterns } from "./redaction.js";
import { setLogLevel, initFileLogging } from "./logger.js";

const USAGE = `Usage: consilium <command> [options]

Commands:
  deliberate               Run a panel deliberation on a case
  experts                  List the configured panel and check backend availability
  init                     Create consilium.config.json
  start                    Start MCP server (stdio)

Deliberate options:
  --case <file>            Case context as JSON
  --demographics <text>    Intake answer (used when --case is absent)
  --history <text>         Intake answer
  --symptoms <text>        Intake answer
  --medications <text>     Intake answer
  --notes <text>           Anything else the patient reported
  --image <file>           Imaging study to caption into the case
  --max-rounds <n>         Round budget (1-13, default: from config)
  --session-id <id>        Session id (default: random)
  --stop-on-consensus      End as soon as a round reaches consensus
  --sequential             Query experts one after another

Options:
  --config <file>          Config file (default: ./consilium.config.json)
  --verbose                Show info-level logs on stderr
  --debug                  Show all logs (debug level) on stderr
  --help                   Show this help
  --version                Show version

Environment:
  CONSILIUM_LOG_LEVEL      Set log level: error, warn (default), info, debug
  CONSILIUM_API_BASE       Override backend.endpoint
  CONSILIUM_API_KEY        Override backend.apiKey
  CONSILIUM_MODEL          Override backend.model
`;

async function main() {
  const rawArgs = process.argv.slice(2);

  // Process global flags before anything else
  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }
  const args = rawArgs.filter((a) => a !== "--verbose" && a !== "--debug");

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    return;
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log("consilium v0.1.0");
    return;
  }

  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case "deliberate":
      await cmdDeliberate(rest);
      break;
    case "experts":
      await cmdExperts(rest);
      break;
    case "init":
      cmdInit();
      break;
    case "start":
      await cmdStart(rest);
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exitCode = 1;
  }
}

function setup(configPath: string | undefined): Config {
  const config = loadConfig(configPath);
  initFileLogging(getUserDataDir(config), config.logging);
  for (const source of setSensitivePatterns(config.privacy.sensitivePatterns)) {
    console.error(`Warning: ignoring invalid sensitive pattern "${source}"`);
  }
  return config;
}

function parseMaxRounds(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_ROUNDS_LIMIT) {
    throw new Error(`--max-rounds must be an integer between 1 and ${MAX_ROUNDS_LIMIT} (got "${value}")`);
  }
  return n;
}

function readCaseFile(path: string): CaseContext {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`cannot read case file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const checked = validateCaseContext(raw);
  if (!checked.ok) throw new InvalidCaseContextError(checked.issues);
  return checked.value;
}

async function cmdDeliberate(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string" },
      case: { type: "string" },
      demographics: { type: "string" },
      history: { type: "string" },
      symptoms: { type: "string" },
      medications: { type: "string" },
      notes: { type: "string" },
      image: { type: "string" },
      "max-rounds": { type: "string" },
      "session-id": { type: "string" },
      "stop-on-consensus": { type: "boolean", default: false },
      sequential: { type: "boolean", default: false },
    },
  });

  const config = setup(values.config);
  const maxRounds = parseMaxRounds(values["max-rounds"], config.deliberation.maxRounds);

  let imagingFinding: string | undefined;
  if (values.image) {
    const captioner = createCaptioner(config.imaging);
    imagingFinding = await captioner.caption(await loadImage(values.image));
    console.log(`Imaging finding (${captioner.name}): ${imagingFinding}`);
  }

  let context: CaseContext;
  if (values.case) {
    const fromFile = readCaseFile(values.case);
    context = imagingFinding ? { ...fromFile, imagingFinding } : fromFile;
  } else {
    if (!values.symptoms && !values.demographics && !values.history && !values.medications) {
      throw new Error("deliberate needs --case <file> or at least one intake answer (--symptoms ...)");
    }
    context = buildCaseContext({
      demographics: values.demographics,
      history: values.history,
      symptoms: values.symptoms,
      medications: values.medications,
      notes: values.notes,
      imagingFinding,
    });
  }

  const effective: Config = {
    ...config,
    deliberation: {
      ...config.deliberation,
      stopOnConsensus: values["stop-on-consensus"] || config.deliberation.stopOnConsensus,
      parallel: values.sequential ? false : config.deliberation.parallel,
    },
  };
  const { orchestrator, panelOptions } = createOrchestrator(effective);
  const panel = createPanel(effective, panelOptions);
  const sessionId = values["session-id"] ?? randomUUID();

  console.log(`Session ${sessionId}`);
  console.log(`  Panel: ${panel.map((e) => `${e.id} (${e.persona.name})`).join(", ")}`);
  console.log(`  Max rounds: ${maxRounds} | Stop on consensus: ${effective.deliberation.stopOnConsensus}`);
  console.log("");

  orchestrator.events.onRoundCompleted((e) => {
    const fallbacks = e.fallbackExperts.length > 0 ? ` (fallback: ${e.fallbackExperts.join(", ")})` : "";
    console.log(`  Round ${e.round}: consensus ${e.consensus.reachedConsensus ? "yes" : "no"}${fallbacks}`);
  });

  orchestrator.startSession(sessionId, context, maxRounds, effective.panel.size);
  const result = await orchestrator.runDeliberation(sessionId, panel);
  printResult(result);
}

function formatResult(result: DeliberationResult): string {
  const { finalDecision } = result;
  const lines = [
    "=".repeat(60),
    "",
    "--- Consensus hypotheses ---",
    ...finalDecision.consensusHypotheses.map((h, i) => `${i + 1}. ${h}`),
    "",
    "--- Prioritized tests ---",
    ...finalDecision.prioritizedTests.map((t, i) => `${i + 1}. ${t}`),
    "",
    "--- Rationale ---",
    finalDecision.rationale,
    "",
    "=".repeat(60),
    "",
    `Rounds: ${result.totalRounds} | Ended: ${result.terminationReason} | Duration: ${(result.durationMs / 1000).toFixed(1)}s`,
    `Consensus: ${result.consensusReached ? `yes (rounds ${result.consensusRounds.join(", ")})` : "no"}`,
  ];
  const tokens = totalTokenCount(result.usage.totalTokens);
  if (tokens > 0) {
    lines.push(`Tokens: ${tokens.toLocaleString()} (${result.usage.calls} calls)`);
  }
  return lines.join("\n");
}

function printResult(result: DeliberationResult): void {
  console.log("");
  console.log(formatResult(result));
}

async function cmdExperts(args: string[]) {
  const { values } = parseArgs({
    args,
    options: { config: { type: "string" } },
  });
  const config = setup(values.config);
  console.log(`Panel (size ${config.panel.size}):\n`);

  for (const expert of config.panel.experts) {
    const persona = resolvePersona(expert.persona, config);
    const backend = createBackend(config.backend, expert.model);
    const status = (await backend.isAvailable()) ? "available" : "NOT AVAILABLE";
    console.log(`  ${expert.id}: ${persona.role} [${backend.name}] ${status}`);
  }
}

function cmdInit() {
  const filename = "consilium.config.json";
  if (existsSync(filename)) {
    console.log(`${filename} already exists. Skipping.`);
    return;
  }

  const defaults = ConfigSchema.parse({});
  const initial = {
    user: defaults.user,
    backend: {
      type: defaults.backend.type,
      endpoint: defaults.backend.endpoint,
      model: defaults.backend.model,
    },
    panel: {
      size: 3,
      experts: [
        { id: "expert_1", persona: "generalist" },
        { id: "expert_2", persona: "internist" },
        { id: "expert_3", persona: "skeptic" },
      ],
    },
    deliberation: defaults.deliberation,
  };

  writeFileSync(filename, JSON.stringify(initial, null, 2) + "\n");
  console.log(`Created ${filename}`);
  console.log("Set CONSILIUM_API_KEY (or backend.apiKey) before running a deliberation.");
}

async function cmdStart(args: string[]) {
  const { values } = parseArgs({
    args,
    options: { config: { type: "string" } },
  });
  console.error("Starting consilium MCP server (stdio)...");
  await startServer(values.config);
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
