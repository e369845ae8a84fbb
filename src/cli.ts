#!/usr/bin/env node
import fs from 'node:fs';

import { Command, Option } from 'commander';

import type { LogFormat } from './logging/structured-logger.js';
import type { Configuration } from './config.js';
import type { LogEntry, PersistenceHook, QueryLanguage } from './types.js';
import type { CommanderError } from 'commander';

import { formatEventForCli, resolveCliOutputMode } from './cli-output-mode.js';
import { loadConfiguration, resolveSettings, withOverrides, type Settings } from './config.js';
import { DatasetHandle } from './dataset/dataset-handle.js';
import { LLMJudge } from './evaluation/llm-judge.js';
import { checkCodeSafety, renderReport } from './evaluation/metrics-evaluator.js';
import { AnthropicCapability } from './llm-providers/anthropic.js';
import { createStructuredLogger } from './logging/structured-logger.js';
import { JsonlPersistence } from './persistence.js';
import { buildHistoryMessages } from './prompt-builder.js';
import { validateQuery } from './sandbox/query-validator.js';
import { ShutdownController } from './shutdown-controller.js';
import { describeToolSchema } from './tool-schema.js';
import { TurnOrchestrator } from './turn-orchestrator.js';
import { errorMessage, setWarningSink } from './utils.js';

const program = new Command();
const shutdownController = new ShutdownController();

// Centralized exit path so every exit carries a reason on stderr
let hasExited = false;
function exitWith(code: number, reason: string): void {
  if (code !== 0) {
    try {
      process.stderr.write(`tabular-analyst: ${reason}\n`);
    } catch { /* stderr closed */ }
  }
  if (!hasExited) {
    hasExited = true;
    process.exitCode = code;
  }
}

program.exitOverride((err: CommanderError) => {
  // help and version output are not failures
  if (err.exitCode === 0) return;
  exitWith(err.exitCode, err.message);
});

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) throw new Error(`expected a positive integer, got '${value}'`);
  return parsed;
};

function loadDataset(file: string): DatasetHandle {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new Error(`cannot read dataset ${file}: ${errorMessage(error)}`);
  }
  if (!Array.isArray(json)) throw new Error(`dataset ${file} must be a JSON array of records`);
  return DatasetHandle.fromRecords(json);
}

function buildJudge(settings: Settings, llm: AnthropicCapability, log: (entry: LogEntry) => void): LLMJudge | undefined {
  if (!settings.judge.enabled) return undefined;
  const model = settings.judge.model === settings.llm.model
    ? llm.languageModel
    : new AnthropicCapability({ ...settings.llm, model: settings.judge.model }).languageModel;
  return new LLMJudge({ model, log, abortSignal: shutdownController.signal });
}

interface AskOptions {
  data: string;
  config?: string;
  format?: string;
  maxIterations?: number;
  session?: string;
  logFormat?: LogFormat;
  verbose?: boolean;
}

async function ask(question: string, options: AskOptions): Promise<void> {
  const mode = resolveCliOutputMode(options.format);
  const overrides: Configuration = {
    ...(options.maxIterations !== undefined ? { agent: { maxIterations: options.maxIterations } } : {}),
    logging: {
      ...(options.logFormat !== undefined ? { format: options.logFormat } : {}),
      ...(options.verbose !== undefined ? { verbose: options.verbose } : {}),
    },
  };
  const settings = resolveSettings(withOverrides(loadConfiguration(options.config), overrides, 'command-line options'));
  const logger = createStructuredLogger({
    format: settings.logging.format,
    verbose: settings.logging.verbose,
    color: settings.logging.format === 'console' && process.stderr.isTTY,
  });
  const log = logger.asSink();
  shutdownController.onShutdown('warning-sink', () => {
    setWarningSink(undefined);
  });
  setWarningSink((message) => {
    log({
      timestamp: Date.now(),
      severity: 'WRN',
      iteration: 0,
      invocation: 0,
      direction: 'response',
      type: 'agent',
      remoteIdentifier: 'agent:warning',
      fatal: false,
      message,
    });
  });

  const dataset = loadDataset(options.data);
  const llm = new AnthropicCapability(settings.llm);
  let persistence: PersistenceHook | undefined;
  let history: ReturnType<typeof buildHistoryMessages> = [];
  if (options.session !== undefined) {
    const dir = settings.persistence.sessionsDir;
    if (dir === undefined) throw new Error('--session requires persistence.sessionsDir in the configuration');
    const store = new JsonlPersistence(dir, options.session);
    shutdownController.onShutdown('session-store', async () => {
      await store.flush();
    });
    history = buildHistoryMessages(await store.load());
    persistence = store;
  }

  const orchestrator = new TurnOrchestrator({
    llm,
    settings,
    log,
    judge: buildJudge(settings, llm, log),
    ...(persistence !== undefined ? { persistence } : {}),
  });

  const onSigint = (): void => {
    // a second Ctrl-C while cleanups run exits at once
    if (shutdownController.stopping) {
      process.exit(130);
    }
    shutdownController.shutdown(log).catch((error: unknown) => {
      exitWith(1, `shutdown failed: ${errorMessage(error)}`);
    });
  };
  process.on('SIGINT', onSigint);

  let failed = false;
  // eslint-disable-next-line functional/no-loop-statements
  for await (const event of orchestrator.run({ userMessage: question, dataset, history, signal: shutdownController.signal })) {
    const line = formatEventForCli(event, mode);
    if (line !== undefined) process.stdout.write(`${line}\n`);
    if (event.type === 'error' && mode === 'text') process.stderr.write(`error: ${event.data.message}\n`);
    if (event.type === 'done') failed = event.data.reason === 'error';
  }
  process.off('SIGINT', onSigint);
  await shutdownController.shutdown(log, 'run finished');
  if (failed) exitWith(1, 'run ended with an error');
}

function checkQuery(query: string, language: QueryLanguage): void {
  const validation = validateQuery(query, language);
  const safety = checkCodeSafety(query, language);
  process.stdout.write(`${renderReport(safety)}\n`);
  if (!validation.ok) {
    process.stdout.write(`REJECTED: ${validation.error}\n`);
    exitWith(1, 'query rejected');
    return;
  }
  process.stdout.write(`OK: ${validation.statement}\n`);
}

program
  .name('tabular-analyst')
  .description('Ask an LLM analyst questions about a tabular dataset');

program
  .command('ask')
  .description('Run one question against a JSON array of records')
  .argument('<question>', 'Question for the analyst')
  .requiredOption('--data <file>', 'JSON file holding an array of records')
  .option('--config <path>', 'Configuration file (defaults to ./.tabular-analyst.json, then ~/.tabular-analyst.json)')
  .addOption(new Option('--format <mode>', 'Output: events (ndjson) or text').choices(['events', 'text']).default('text'))
  .option('--max-iterations <n>', 'Override agent.maxIterations', parsePositiveInt)
  .option('--session <id>', 'Load and append the JSONL session history under persistence.sessionsDir')
  .addOption(new Option('--log-format <format>', 'Log format on stderr').choices(['logfmt', 'json', 'console', 'none']))
  .option('--verbose', 'Include verbose log entries')
  .action(async (question: string, options: AskOptions) => {
    try {
      await ask(question, options);
    } catch (error) {
      exitWith(1, errorMessage(error));
    }
  });

program
  .command('tools')
  .description('Print the versioned tool schema as JSON')
  .action(() => {
    process.stdout.write(`${JSON.stringify(describeToolSchema(), null, 2)}\n`);
  });

program
  .command('check-sql')
  .description('Validate a query without running it')
  .argument('<query>', 'Query text')
  .addOption(new Option('--language <language>', 'sql or script').choices(['sql', 'script']).default('sql'))
  .action((query: string, options: { language: QueryLanguage }) => {
    checkQuery(query, options.language);
  });

program.parseAsync().catch((error: unknown) => {
  exitWith(1, errorMessage(error));
});
