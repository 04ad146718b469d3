#!/usr/bin/env node
import fs from 'node:fs';
import { pathToFileURL } from 'node:url';

import { Command, InvalidArgumentError, Option } from 'commander';

import type { Configuration } from './config.js';
import type { LogFormat } from './logging/structured-logger.js';

import { parseDurationMs } from './cache/ttl.js';
import { loadConfiguration } from './config.js';
import { createStructuredLogger } from './logging/structured-logger.js';
import { ToolRuntime } from './runtime.js';
import { errorMessage, setWarningSink, tryJsonStringify } from './utils.js';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  now: () => number;
}

interface GlobalOptions {
  config?: string;
  storageDir?: string;
  logFormat?: LogFormat;
}

const defaultIo: CliIo = {
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
  env: process.env,
  now: () => Date.now(),
};

const parsePositiveInt = (value: string): number => {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0 || String(n) !== value.trim()) throw new InvalidArgumentError('expected a positive integer');
  return n;
};

const parsePositiveNumber = (value: string): number => {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('expected a positive number');
  return n;
};

/** Epoch milliseconds, an ISO date, or a duration meaning "that long ago" (`2h`, `7d`). */
export function parseTimeArg(value: string, now: number): number | undefined {
  const raw = value.trim();
  if (/^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  const ago = /[a-z]$/i.test(raw) ? parseDurationMs(raw) : undefined;
  if (ago !== undefined) return now - ago;
  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export interface ProgramHooks {
  /** Called once the lazily opened runtime exists. */
  onRuntime?: (runtime: ToolRuntime) => void;
}

export function createProgram(io: CliIo = defaultIo, hooks: ProgramHooks = {}): Command {
  const program = new Command();
  let runtime: ToolRuntime | undefined;

  const printJson = (value: unknown): void => {
    io.stdout(`${tryJsonStringify(value, 2) ?? 'null'}\n`);
  };

  const notFound = (what: string): void => {
    io.stderr(`${what} not found\n`);
    process.exitCode = 1;
  };

  const timeOption = (value: string | undefined, flag: string): number | undefined => {
    if (value === undefined) return undefined;
    const parsed = parseTimeArg(value, io.now());
    if (parsed === undefined) throw new InvalidArgumentError(`${flag}: expected epoch ms, an ISO date or a duration such as 24h`);
    return parsed;
  };

  // Opened lazily so --help and argument errors never touch the storage directory
  const open = (): ToolRuntime => {
    if (runtime !== undefined) return runtime;
    const opts = program.opts<GlobalOptions>();
    const loaded = loadConfiguration(opts.config, io.env);
    const config: Configuration = opts.storageDir !== undefined ? { ...loaded, storageDir: opts.storageDir } : loaded;
    const format = opts.logFormat ?? config.logging.format;
    const logger = createStructuredLogger({ format, logfmtWriter: io.stderr, jsonWriter: io.stderr, consoleWriter: io.stderr });
    setWarningSink(logger.warningHandler('store'));
    runtime = new ToolRuntime(config, { env: io.env, clock: io.now, onLog: logger.emit.bind(logger) });
    hooks.onRuntime?.(runtime);
    return runtime;
  };

  program
    .name('toolrun')
    .description('Inspect tool-call traces, turn metrics and offloaded artifacts')
    .option('--config <file>', 'Configuration file (defaults to ./.toolrun.json, then ~/.toolrun.json)')
    .option('--storage-dir <dir>', 'Storage root (overrides config and TOOLRUN_DATA_DIR)')
    .addOption(new Option('--log-format <format>', 'Diagnostic log format on stderr').choices(['logfmt', 'json', 'console', 'none']))
    .showHelpAfterError()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program.hook('postAction', () => {
    runtime?.close();
    runtime = undefined;
  });

  program
    .command('conversations')
    .description('List traced conversations, most recent activity first')
    .option('--session <id>', 'Only conversations of this session')
    .option('--limit <n>', 'Maximum rows', parsePositiveInt, 50)
    .action((opts: { session?: string; limit: number }) => {
      printJson(open().monitoring.listConversations(opts.session, opts.limit));
    });

  program
    .command('trace')
    .description('Show the latest trace of a conversation')
    .argument('<conversationId>')
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'mermaid', 'tree']).default('json'))
    .action(async (conversationId: string, opts: { format: 'json' | 'mermaid' | 'tree' }) => {
      const { monitoring } = open();
      if (opts.format === 'json') {
        const trace = await monitoring.loadTrace(conversationId);
        if (trace === undefined) { notFound(`trace for ${conversationId}`); return; }
        printJson(trace);
        return;
      }
      const text = await monitoring.renderTrace(conversationId, opts.format);
      if (text === undefined) { notFound(`trace for ${conversationId}`); return; }
      io.stdout(`${text}\n`);
    });

  program
    .command('spans')
    .description('Flattened span list of the latest trace of a conversation')
    .argument('<conversationId>')
    .action(async (conversationId: string) => {
      const spans = await open().monitoring.getSpans(conversationId);
      if (spans === undefined) { notFound(`trace for ${conversationId}`); return; }
      printJson(spans);
    });

  program
    .command('metrics')
    .description('Turn metrics of one conversation, or aggregates over a session or time window')
    .option('--conversation <id>')
    .option('--session <id>')
    .option('--since <time>', 'Epoch ms, ISO date or a duration ago (24h)')
    .option('--until <time>', 'Epoch ms, ISO date or a duration ago')
    .action(async (opts: { conversation?: string; session?: string; since?: string; until?: string }) => {
      const report = await open().monitoring.getMetrics({
        conversationId: opts.conversation,
        sessionId: opts.session,
        startTime: timeOption(opts.since, '--since'),
        endTime: timeOption(opts.until, '--until'),
      });
      printJson(report);
    });

  program
    .command('performance')
    .description('LLM / tool / other time split for the latest turn of a conversation')
    .argument('<conversationId>')
    .action(async (conversationId: string) => {
      const summary = await open().monitoring.getPerformanceSummary(conversationId);
      if (summary === undefined) { notFound(`trace for ${conversationId}`); return; }
      printJson(summary);
    });

  program
    .command('recent')
    .description('Activity over the last hours')
    .option('--hours <n>', 'Window size in hours', parsePositiveNumber, 24)
    .action((opts: { hours: number }) => {
      printJson(open().monitoring.recentActivity(opts.hours));
    });

  program
    .command('artifacts')
    .description('List offloaded artifacts, newest first')
    .option('--tool <name>')
    .option('--limit <n>', 'Maximum rows', parsePositiveInt, 100)
    .action(async (opts: { tool?: string; limit: number }) => {
      printJson(await open().artifacts.listArtifacts(opts.tool, opts.limit));
    });

  program
    .command('artifact')
    .description('Print the payload of one artifact')
    .argument('<artifactId>')
    .action(async (artifactId: string) => {
      const outcome = await open().artifacts.retrieve(artifactId);
      if (!outcome.ok) {
        io.stderr(`${outcome.error.message}\n`);
        process.exitCode = 2;
        return;
      }
      if (outcome.value === undefined) { notFound(`artifact ${artifactId}`); return; }
      printJson(outcome.value);
    });

  program
    .command('cleanup')
    .description('Delete traces, metrics and artifacts past their retention')
    .option('--traces <days>', 'Trace retention in days', parsePositiveNumber)
    .option('--metrics <days>', 'Metrics retention in days', parsePositiveNumber)
    .option('--artifacts <hours>', 'Artifact retention in hours', parsePositiveNumber)
    .action(async (opts: { traces?: number; metrics?: number; artifacts?: number }) => {
      printJson(await open().cleanup({ traceDays: opts.traces, metricsDays: opts.metrics, artifactHours: opts.artifacts }));
    });

  return program;
}

export async function main(argv: string[] = process.argv, io: CliIo = defaultIo, hooks: ProgramHooks = {}): Promise<void> {
  const opened: ToolRuntime[] = [];
  try {
    await createProgram(io, {
      onRuntime: (runtime) => {
        opened.push(runtime);
        hooks.onRuntime?.(runtime);
      },
    }).parseAsync(argv);
  } catch (error: unknown) {
    io.stderr(`toolrun: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  } finally {
    // postAction does not run when an action throws
    opened.forEach((runtime) => { runtime.close(); });
  }
}

const entry = process.argv[1];
if (entry !== undefined && fs.existsSync(entry) && pathToFileURL(fs.realpathSync(entry)).href === import.meta.url) {
  void main();
}
