// ═══════════════════════════════════════════════════════════
// TERMSAGE — Entry Point
// ═══════════════════════════════════════════════════════════

import { join } from 'node:path';
import type { TermsageConfig } from './core/types.js';
import type { Logger } from './core/logger.js';
import type { Terminal } from './core/terminal.js';
import type { CommandRunner } from './core/executor.js';
import type { GitRunner } from './core/context.js';
import { ConfigStore, resolveDataDir } from './core/config.js';
import { OllamaClient } from './core/llm.js';
import { CommandRuntime } from './core/runtime.js';
import { HistoryStore } from './history/history-store.js';
import { createConsoleTerminal } from './core/terminal.js';
import { createLogger } from './core/logger.js';
import { getDefaultRuleTable } from './safety/rules.js';
import type { CompiledRuleTable } from './safety/rules.js';

export interface TermsageOptions {
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Per-invocation model override */
  model?: string;
  /** Generation timeout in milliseconds */
  timeoutMs?: number;
  dryRun?: boolean;
  /** Recent history entries shown to the model */
  historyLimit?: number;
  cwd?: string;
  terminal?: Terminal;
  fetch?: typeof fetch;
  runCommand?: CommandRunner;
  git?: GitRunner;
  rules?: CompiledRuleTable;
}

/** Everything one CLI invocation works with */
export interface Termsage {
  dataDir: string;
  store: ConfigStore;
  config: TermsageConfig;
  client: OllamaClient;
  history: HistoryStore;
  rules: CompiledRuleTable;
  terminal: Terminal;
  logger: Logger;
  runtime: CommandRuntime;
}

/**
 * Wire up termsage.
 *
 * 1. Resolve the data directory and load config.yaml
 * 2. Build the model client
 * 3. Open the history file
 * 4. Load the danger rules
 * 5. Assemble the runtime
 */
export async function createTermsage(options: TermsageOptions = {}): Promise<Termsage> {
  const env = options.env ?? process.env;

  // ─── 1. Config ──────────────────────────────────────────
  const dataDir = options.dataDir ?? resolveDataDir(env);
  const store = new ConfigStore({ dataDir, env });
  const loaded = await store.load();
  const config: TermsageConfig = options.model ? { ...loaded, model: options.model } : loaded;

  const logger = createLogger('Runtime', { verbose: config.verbose });
  logger.debug(`Data directory: ${dataDir}`);

  // ─── 2. Model client ────────────────────────────────────
  const client = new OllamaClient({
    baseUrl: config.backendUrl,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    logger: createLogger('LLM', { verbose: config.verbose }),
  });

  // ─── 3. History ─────────────────────────────────────────
  const history = new HistoryStore({
    filePath: join(dataDir, 'history.txt'),
    maxEntries: config.maxHistory,
  });

  // ─── 4. Rules ───────────────────────────────────────────
  const rules = options.rules ?? getDefaultRuleTable();
  logger.debug(`Danger rules v${rules.version} (${rules.rules.length} rules)`);

  // ─── 5. Runtime ─────────────────────────────────────────
  const terminal = options.terminal ?? createConsoleTerminal();
  const runtime = new CommandRuntime({
    config,
    client,
    terminal,
    history,
    historyLimit: options.historyLimit,
    rules,
    runCommand: options.runCommand,
    git: options.git,
    cwd: options.cwd,
    dryRun: options.dryRun,
    logger,
  });

  return { dataDir, store, config, client, history, rules, terminal, logger, runtime };
}

export { CommandRuntime, createQuery, exitCodeFor, isAffirmative } from './core/runtime.js';
export { OllamaClient, normalizeBaseUrl } from './core/llm.js';
export type { ModelClient, GenerateOptions } from './core/llm.js';
export { ConfigStore, DEFAULT_CONFIG, resolveDataDir } from './core/config.js';
export { HistoryStore } from './history/history-store.js';
export { buildContext } from './core/context.js';
export { composePrompt } from './core/prompts.js';
export type { PromptTask, PromptTemplate } from './core/prompts.js';
export { sanitize } from './core/sanitizer.js';
export { classify } from './safety/classifier.js';
export { loadRuleTable, parseRuleTable, getDefaultRuleTable } from './safety/rules.js';
export { runCommand } from './core/executor.js';
export * from './core/errors.js';
export * from './core/types.js';
