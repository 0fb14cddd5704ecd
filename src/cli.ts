#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { ErrorInfo, RunOverrides } from './types.js';
import type { CommanderError } from 'commander';

import { Agent } from './agent.js';
import { API_KEY_ENV, createProviderFactory, loadConfiguration, resolveDefaults, resolveSettings } from './config.js';
import { toErrorInfo } from './errors.js';
import { makeLogCallback } from './log-sink-tty.js';
import { LOG_FORMATS, isLogFormat } from './logging/structured-logger.js';
import { MODEL_CATALOG, listModels } from './llm-providers/model-catalog.js';
import { PROVIDER_KINDS } from './llm-providers/provider-factory.js';
import { ShutdownController } from './shutdown-controller.js';
import { setWarningSink } from './utils.js';

const VERSION = '0.1.0';

interface SolveOptions {
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  fallback?: string[];
  verifyRetries?: number;
  config?: string;
  logFormat?: string;
  verbose?: boolean;
  traceLlm?: boolean;
}

const shutdownController = new ShutdownController();

let hasExited = false;
function exitWith(code: number): never {
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

function printError(info: ErrorInfo): void {
  process.stderr.write(`${JSON.stringify({ error: info })}\n`);
}

const parseNumber = (value: string): number => Number(value);

const parseList = (value: string): string[] => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);

const program = new Command();

program
  .name('agentic-solver')
  .description('Understand, plan, execute and verify a natural-language task with an LLM')
  .version(VERSION);

program.exitOverride((err: CommanderError) => {
  exitWith(err.exitCode);
});

program
  .command('solve')
  .description('Run one task through UNDERSTAND, PLAN, EXECUTE and VERIFY')
  .argument('<task>', 'Task description')
  .option('--provider <name>', 'Provider to use for this run (overrides the fallback chain)')
  .option('--model <id>', 'Model id for this run')
  .option('--temperature <n>', 'Sampling temperature between 0 and 1', parseNumber)
  .option('--max-tokens <n>', 'Maximum output tokens per call', parseNumber)
  .option('--stream', 'Stream EXECUTE output to stdout as it arrives')
  .option('--fallback <names>', 'Comma-separated provider fallback chain', parseList)
  .option('--verify-retries <n>', 'Extra EXECUTE attempts after a failed verification', parseNumber)
  .option('--config <path>', 'Configuration file (YAML or JSON)')
  .addOption(new Option('--log-format <format>', 'Log output format').choices([...LOG_FORMATS]))
  .option('--verbose', 'Log step and call details')
  .option('--trace-llm', 'Trace LLM HTTP requests and responses')
  .action(async (task: string, options: SolveOptions) => {
    const code = await solve(task, options);
    exitWith(code);
  });

program
  .command('providers')
  .description('List provider kinds, their models and API key variables')
  .action(() => {
    PROVIDER_KINDS.forEach((kind) => {
      const models = listModels(kind);
      const keyEnv = API_KEY_ENV[kind];
      const modelText = models.length > 0 ? models.join(', ') : `any (default ${MODEL_CATALOG[kind].defaultModel})`;
      process.stdout.write(`${kind}\n  models: ${modelText}\n${keyEnv !== undefined ? `  api key: ${keyEnv}\n` : ''}`);
    });
  });

async function solve(task: string, options: SolveOptions): Promise<number> {
  const onLog = makeLogCallback({
    format: options.logFormat !== undefined && isLogFormat(options.logFormat) ? options.logFormat : undefined,
    verbose: options.verbose === true,
    traceLlm: options.traceLlm === true,
  });
  setWarningSink((message) => {
    onLog({ timestamp: Date.now(), severity: 'WRN', type: 'agent', direction: 'event', remoteIdentifier: 'agent:warning', fatal: false, message });
  });

  const handleSignal = (sig: NodeJS.Signals): void => {
    onLog({ timestamp: Date.now(), severity: 'WRN', type: 'agent', direction: 'event', remoteIdentifier: 'agent:signal', fatal: false, message: `received ${sig}, cancelling run` });
    shutdownController.shutdown({ reason: `received ${sig}`, logger: onLog }).catch((err: unknown) => {
      process.stderr.write(`[warn] shutdown failed: ${toErrorInfo(err).message}\n`);
    });
  };
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((sig) => { process.once(sig, handleSignal); });

  try {
    const file = loadConfiguration(options.config);
    const settings = resolveSettings(resolveDefaults(), file);
    const factory = createProviderFactory(settings, { onLog, traceLLM: options.traceLlm === true });
    const chain = options.fallback ?? (settings.fallbackChain.length > 0 ? settings.fallbackChain : undefined);
    const agent = new Agent({
      factory,
      chain,
      verifyRetries: options.verifyRetries ?? settings.verifyRetries,
      stream: settings.stream,
      onLog,
    });
    const overrides: RunOverrides = {};
    if (options.provider !== undefined) overrides.provider = options.provider;
    if (options.model !== undefined) overrides.model = options.model;
    if (options.temperature !== undefined) overrides.temperature = options.temperature;
    if (options.maxTokens !== undefined) overrides.maxTokens = options.maxTokens;
    if (options.stream === true) overrides.stream = true;

    let streamed = false;
    const report = await agent.run(task, overrides, {
      abortSignal: shutdownController.signal,
      onChunk: (chunk) => {
        streamed = true;
        process.stdout.write(chunk);
      },
    });
    if (report.error !== undefined) {
      if (streamed) process.stdout.write('\n');
      printError(report.error);
      return 1;
    }
    // streamed text may belong to an attempt that lost verification
    process.stdout.write(streamed ? `\n\n${report.result ?? ''}\n` : `${report.result ?? ''}\n`);
    return 0;
  } catch (err) {
    printError(toErrorInfo(err));
    return 1;
  } finally {
    signals.forEach((sig) => { process.removeListener(sig, handleSignal); });
    setWarningSink(undefined);
  }
}

program.parseAsync(process.argv).catch((err: unknown) => {
  printError(toErrorInfo(err));
  exitWith(1);
});
