import { parseArgs as parseNodeArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BackupManager } from "./backup.js";
import { COMPACT_DEFAULTS, LlmMergeJudge, runCompact, type CompactReport } from "./compactor.js";
import { loadConfig, resolvePath } from "./config.js";
import { STATE_DELTA_TAG, STATE_DELTA_TYPE, consolidateSession, reflectOnSession } from "./consolidator.js";
import { CapabilityUnavailableError, DuplicateContentError, MemoryEngineError } from "./errors.js";
import { createCompleter, type CompletionProvider } from "./llm.js";
import { logger } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import { generatePreload, writePreload } from "./predictor.js";
import type { ConsolidationResult } from "./responses.js";
import { createServer, type ServerDeps } from "./server.js";
import { readSessionLog } from "./session-log.js";
import { tagAll, tagMemory } from "./tagger.js";
import type { AppConfig, LlmConfig } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const COMMANDS = ["serve", "consolidate", "reflect", "compact", "tag", "predict", "status", "backup"] as const;
export type CliCommand = (typeof COMMANDS)[number];

const CLI_PARSE_OPTIONS = {
  db: { type: "string" },
  model: { type: "string" },
  help: { type: "boolean", short: "h" },
  "dry-run": { type: "boolean" },
  threshold: { type: "string" },
  limit: { type: "string" },
  hash: { type: "string" },
  all: { type: "boolean" },
  output: { type: "string" },
} as const;

export const USAGE = `Usage: memory-consolidator <command> [options]

Commands:
  serve                     Run the MCP server on stdio
  consolidate               Digest the latest session into a state-delta memory
  reflect                   Show the digest of the latest session without storing it
  compact                   Merge duplicate and superseded memories
  tag                       Add entity tags to memories (--hash <hash> or --all)
  predict                   Write a briefing for the next session
  status                    Show store statistics and open threads
  backup                    Snapshot the database and export memories as JSON

Options:
  --db <path>               Database file (default: $MEMORY_DB_PATH)
  --model <name>            Model for text completion (default: $LLM_MODEL)
  --dry-run                 compact: report verdicts, change nothing
  --threshold <0-1>         compact: minimum word overlap (default: ${COMPACT_DEFAULTS.threshold})
  --limit <n>               compact: most recent memories to compare (default: ${COMPACT_DEFAULTS.limit})
  --hash <hash>             tag: the memory to tag
  --all                     tag: every memory with fewer than 5 tags
  --output <path>           predict: briefing file (default: $MEMORY_PRELOAD_PATH)
  -h, --help                Show this help`;

export interface CliArgs {
  command: CliCommand | null;
  help: boolean;
  dbPath?: string;
  model?: string;
  dryRun: boolean;
  threshold?: number;
  limit?: number;
  hash?: string;
  all: boolean;
  output?: string;
}

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; message: string };

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parseRaw(argv: string[]) {
  return parseNodeArgs({
    args: argv,
    options: CLI_PARSE_OPTIONS,
    allowPositionals: true,
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): ParseResult {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;
  const [name, ...extra] = positionals;
  if (extra.length > 0) return { ok: false, message: `Unexpected argument: ${extra[0]}` };
  let command: CliCommand | null = null;
  if (name !== undefined) {
    if (!isCommand(name)) return { ok: false, message: `Unknown command: ${name}` };
    command = name;
  }

  const args: CliArgs = {
    command,
    help: values.help === true,
    dryRun: values["dry-run"] === true,
    all: values.all === true,
  };
  if (values.db !== undefined) args.dbPath = values.db;
  if (values.model !== undefined) args.model = values.model;
  if (values.hash !== undefined) args.hash = values.hash;
  if (values.output !== undefined) args.output = values.output;

  if (values.threshold !== undefined) {
    const threshold = Number(values.threshold);
    if (values.threshold.trim() === "" || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      return { ok: false, message: `--threshold must be a number between 0 and 1, got "${values.threshold}"` };
    }
    args.threshold = threshold;
  }
  if (values.limit !== undefined) {
    const limit = Number(values.limit);
    if (!Number.isInteger(limit) || limit < 1) {
      return { ok: false, message: `--limit must be a positive integer, got "${values.limit}"` };
    }
    args.limit = limit;
  }

  if (args.command === "tag" && !args.help && (args.hash === undefined) === !args.all) {
    return { ok: false, message: "tag needs exactly one of --hash <hash> or --all" };
  }
  return { ok: true, args };
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  createCompleter?: (config: LlmConfig) => CompletionProvider;
  /** Connects the MCP server to its transport; defaults to stdio. */
  startServer?: (deps: ServerDeps) => Promise<void>;
  now?: () => Date;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

async function startStdioServer(deps: ServerDeps): Promise<void> {
  const server = createServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`MCP server ready (database: ${deps.store.path})`);

  const shutdown = () => {
    deps.store.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

interface CommandContext {
  args: CliArgs;
  config: AppConfig;
  store: MemoryStore;
  io: CliIO;
  now: Date;
  completer(): Promise<CompletionProvider>;
}

function printDigest(io: CliIO, digest: ConsolidationResult): void {
  io.out(`State delta: ${digest.stateDelta}`);
  const { people, projects, tools } = digest.entities;
  if (people.length) io.out(`  People:   ${people.join(", ")}`);
  if (projects.length) io.out(`  Projects: ${projects.join(", ")}`);
  if (tools.length) io.out(`  Tools:    ${tools.join(", ")}`);
  io.out(`  Security: ${digest.securityContext}`);
  io.out(`  Mood:     ${digest.emotionalSignals}`);
  for (const thread of digest.openThreads) io.out(`  - ${thread}`);
}

async function runDigest(ctx: CommandContext, persist: boolean): Promise<number> {
  const logText = readSessionLog(ctx.config.sessionLogPath);
  if (logText === null) {
    ctx.io.err(`Session log not found: ${ctx.config.sessionLogPath}`);
    return EXIT_FAILURE;
  }
  const completer = await ctx.completer();

  try {
    const outcome = persist
      ? await consolidateSession(logText, ctx.store, completer, ctx.now)
      : await reflectOnSession(logText, completer);
    switch (outcome.status) {
      case "no-session":
        ctx.io.out("No session found in the log; nothing to do.");
        return EXIT_OK;
      case "malformed":
        ctx.io.err("The summarizer returned no usable digest; nothing was stored.");
        return EXIT_FAILURE;
      case "previewed":
        printDigest(ctx.io, outcome.digest);
        return EXIT_OK;
      case "stored":
        printDigest(ctx.io, outcome.digest);
        ctx.io.out(`Stored as memory #${outcome.memory.id} (${outcome.memory.contentHash.slice(0, 16)})`);
        return EXIT_OK;
    }
  } catch (error) {
    if (error instanceof DuplicateContentError) {
      ctx.io.out("This session is already consolidated; nothing to do.");
      return EXIT_OK;
    }
    throw error;
  }
}

function printCompactReport(io: CliIO, report: CompactReport): void {
  if (report.compared < 2) {
    io.out("Fewer than two memories; nothing to compare.");
    return;
  }
  io.out(`Compared ${report.compared} memories: ${report.candidates} candidate pair(s) at threshold ${report.threshold}`);
  for (const outcome of report.outcomes) {
    const status = report.dryRun || !outcome.applied ? "" : " [applied]";
    const why = outcome.verdict?.reasoning ? `: ${outcome.verdict.reasoning}` : "";
    io.out(
      `  ${outcome.aHash.slice(0, 8)} ~ ${outcome.bHash.slice(0, 8)} (${outcome.similarity.toFixed(2)}) ${outcome.action}${status}${why}`,
    );
  }
  io.out(`${report.dryRun ? "Dry run: " : ""}${report.merged} merge(s), ${report.linked} link(s)`);
}

async function runCompactCommand(ctx: CommandContext): Promise<number> {
  const judge = new LlmMergeJudge(await ctx.completer());
  if (!ctx.args.dryRun) {
    const backup = await new BackupManager(ctx.config.backupPath).createBackup(ctx.store, ctx.now);
    ctx.io.out(`Backup: ${backup.backupPath}`);
  }
  const report = await runCompact(ctx.store, judge, {
    dryRun: ctx.args.dryRun,
    ...(ctx.args.threshold !== undefined ? { threshold: ctx.args.threshold } : {}),
    ...(ctx.args.limit !== undefined ? { limit: ctx.args.limit } : {}),
  });
  printCompactReport(ctx.io, report);
  return EXIT_OK;
}

async function runTagCommand(ctx: CommandContext): Promise<number> {
  const completer = await ctx.completer();
  if (ctx.args.hash !== undefined) {
    const outcome = await tagMemory(ctx.store, completer, ctx.args.hash);
    switch (outcome.status) {
      case "not-found":
        ctx.io.err(`Memory ${outcome.hash} not found.`);
        return EXIT_FAILURE;
      case "malformed":
        ctx.io.err("The tagger returned no usable suggestion.");
        return EXIT_FAILURE;
      case "tagged":
        ctx.io.out(outcome.added.length ? `Added: ${outcome.added.join(", ")}` : "No new tags.");
        ctx.io.out(`Tags: ${outcome.tags.join(", ")}`);
        return EXIT_OK;
    }
  }

  const report = await tagAll(ctx.store, completer, ctx.args.limit);
  ctx.io.out(
    `Tagged ${report.tagged} of ${report.scanned} memories (+${report.tagsAdded} tags, ${report.skipped} already tagged, ${report.malformed} unusable replies)`,
  );
  return EXIT_OK;
}

const PREVIEW_CHARS = 500;

async function runPredict(ctx: CommandContext): Promise<number> {
  const completer = await ctx.completer();
  const outcome = await generatePreload(
    ctx.store,
    completer,
    {
      logText: readSessionLog(ctx.config.sessionLogPath),
      openQuestions: readSessionLog(ctx.config.openQuestionsPath),
    },
    ctx.now,
  );
  if (outcome.status === "empty") {
    ctx.io.err("The model returned an empty briefing; nothing was written.");
    return EXIT_FAILURE;
  }

  const outputPath = ctx.args.output !== undefined ? resolvePath(ctx.args.output) : ctx.config.preloadPath;
  writePreload(outputPath, outcome.briefing);
  ctx.io.out(`Briefing written to ${outputPath} (${outcome.briefing.length} chars, ${outcome.stateDeltaCount} state delta(s))`);
  ctx.io.out("--- Preview ---");
  ctx.io.out(outcome.briefing.slice(0, PREVIEW_CHARS));
  if (outcome.briefing.length > PREVIEW_CHARS) ctx.io.out("...");
  return EXIT_OK;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function runStatus(ctx: CommandContext): number {
  const stats = ctx.store.stats();
  const deltas = ctx.store.searchByTag(STATE_DELTA_TAG).filter((m) => m.memoryType === STATE_DELTA_TYPE);

  ctx.io.out("=== Memory Status ===");
  ctx.io.out(`  Database:      ${ctx.store.path}`);
  ctx.io.out(`  Memories:      ${stats.count}`);
  ctx.io.out(`  Deleted:       ${stats.deletedCount}`);
  ctx.io.out(`  Graph edges:   ${stats.edgeCount}`);
  ctx.io.out(`  DB size:       ${(stats.sizeBytes / (1024 * 1024)).toFixed(1)} MB`);
  ctx.io.out(`  State deltas:  ${deltas.length}`);

  const threads = stringList(deltas[0]?.metadata.open_threads);
  if (threads.length) {
    ctx.io.out("");
    ctx.io.out("  Open threads (from last consolidation):");
    for (const thread of threads) ctx.io.out(`    - ${thread}`);
  }
  return EXIT_OK;
}

async function runBackup(ctx: CommandContext): Promise<number> {
  const result = await new BackupManager(ctx.config.backupPath).createBackup(ctx.store, ctx.now);
  ctx.io.out(`Backed up ${result.memoriesBackedUp} memories to ${result.backupPath}`);
  return EXIT_OK;
}

/**
 * Run one CLI invocation and resolve to its exit code: 0 on success or when there is
 * nothing to do, 1 on failure, 2 on a usage error.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    io.err(`Error: ${parsed.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
  const { args } = parsed;
  if (args.help) {
    io.out(USAGE);
    return EXIT_OK;
  }
  if (args.command === null) {
    io.err(USAGE);
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env, {
      ...(args.dbPath !== undefined ? { dbPath: args.dbPath } : {}),
      ...(args.model !== undefined ? { model: args.model } : {}),
    });
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }

  const makeCompleter = deps.createCompleter ?? createCompleter;
  const store = new MemoryStore({ dbPath: config.dbPath, busyTimeoutMs: config.busyTimeoutMs });

  if (args.command === "serve") {
    try {
      store.init();
      await (deps.startServer ?? startStdioServer)({
        store,
        completer: makeCompleter(config.llm),
        sessionLogPath: config.sessionLogPath,
        openQuestionsPath: config.openQuestionsPath,
        preloadPath: config.preloadPath,
        backups: new BackupManager(config.backupPath),
      });
      return EXIT_OK;
    } catch (error) {
      store.close();
      io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
      return EXIT_FAILURE;
    }
  }

  const ctx: CommandContext = {
    args,
    config,
    store,
    io,
    now: deps.now?.() ?? new Date(),
    async completer() {
      const completer = makeCompleter(config.llm);
      await completer.verify();
      logger.info(`Using ${completer.description}`);
      return completer;
    },
  };

  try {
    store.init();
    switch (args.command) {
      case "consolidate":
        return await runDigest(ctx, true);
      case "reflect":
        return await runDigest(ctx, false);
      case "compact":
        return await runCompactCommand(ctx);
      case "tag":
        return await runTagCommand(ctx);
      case "predict":
        return await runPredict(ctx);
      case "status":
        return runStatus(ctx);
      case "backup":
        return await runBackup(ctx);
    }
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) {
      io.err(`Text completion unavailable: ${error.message}`);
    } else if (error instanceof MemoryEngineError) {
      io.err(`Error: ${error.message}`);
    } else {
      logger.error("Command failed", { command: args.command, error: String(error) });
      io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return EXIT_FAILURE;
  } finally {
    store.close();
  }
}
