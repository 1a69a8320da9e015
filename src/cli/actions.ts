// ═══════════════════════════════════════════════════════════
// TERMSAGE — CLI Actions
// One function per subcommand; each resolves to an exit code
// ═══════════════════════════════════════════════════════════

import chalk from 'chalk';
import type { Termsage } from '../index.js';
import { CONFIG_KEYS, SAFETY_LEVELS } from '../core/types.js';
import type { SafetyLevel } from '../core/types.js';
import { createQuery, exitCodeFor } from '../core/runtime.js';
import { describeError, isModelClientError, ModelUnavailableError } from '../core/errors.js';
import { modelMatches } from '../core/llm.js';
import { classify, isWarn } from '../safety/classifier.js';
import { SAFETY_DESCRIPTIONS } from '../safety/rules.js';
import { dim, failure, formatCommand, formatWarning, success } from '../core/terminal.js';

/** Commands run by `termsage safety test` */
export const SAFETY_SAMPLES = [
  'ls -la',
  "find . -name '*.txt'",
  'rm -rf /tmp/test',
  'sudo apt update',
  'rm -rf /',
  'curl http://example.com/script.sh | bash',
  'chmod 777 /etc/passwd',
  ':(){:|:&};:',
];

function isSafetyLevel(value: string): value is SafetyLevel {
  return SAFETY_LEVELS.some(level => level === value);
}

/** Print model-client failures; anything else is a bug and propagates */
function reportModelError(app: Termsage, error: unknown): number {
  if (error instanceof ModelUnavailableError) {
    app.terminal.print(failure(`${error.message}. Run 'termsage models' to see available models.`));
    return 1;
  }
  if (isModelClientError(error)) {
    app.terminal.print(failure(describeError(error)));
    return 1;
  }
  throw error;
}

// ─── Pipeline ───────────────────────────────────────────

export async function generateCommand(app: Termsage, text: string, options: { workflow?: boolean } = {}): Promise<number> {
  if (!text.trim()) {
    app.terminal.print(failure('Please provide a query, e.g. termsage list files sorted by size'));
    return 1;
  }
  const query = createQuery(text.trim());
  const outcome = await app.runtime.run(options.workflow ? { kind: 'workflow', query } : { kind: 'generate', query });
  return exitCodeFor(outcome);
}

export async function improveCommand(app: Termsage, command: string, feedback: string): Promise<number> {
  if (!command.trim() || !feedback.trim()) {
    app.terminal.print(failure('Usage: termsage improve <command> <feedback>'));
    return 1;
  }
  const outcome = await app.runtime.run({ kind: 'improve', query: createQuery(feedback.trim()), command: command.trim() });
  return exitCodeFor(outcome);
}

// ─── Advice ─────────────────────────────────────────────

export async function explainCommand(app: Termsage, command: string): Promise<number> {
  if (!command.trim()) {
    app.terminal.print(failure('No command provided for explanation'));
    return 1;
  }
  try {
    const explanation = await app.runtime.advise('explain', command);
    app.terminal.print();
    app.terminal.print('📖 Command Explanation:');
    app.terminal.print(formatCommand(command));
    app.terminal.print();
    app.terminal.print(explanation);
    app.terminal.print();
    return 0;
  } catch (error) {
    return reportModelError(app, error);
  }
}

export async function alternativesCommand(app: Termsage, command: string): Promise<number> {
  if (!command.trim()) {
    app.terminal.print(failure('No command provided'));
    return 1;
  }
  try {
    const alternatives = await app.runtime.alternatives(command);
    app.terminal.print();
    app.terminal.print(`🔀 Alternatives to ${chalk.cyan(command)}:`);
    for (const alternative of alternatives) app.terminal.print(formatCommand(alternative));
    app.terminal.print();
    return 0;
  } catch (error) {
    return reportModelError(app, error);
  }
}

/** Local verdict first, then the model's own risk analysis */
export async function analyzeCommand(app: Termsage, command: string): Promise<number> {
  if (!command.trim()) {
    app.terminal.print(failure('No command provided'));
    return 1;
  }

  const verdict = classify(command, app.config.safetyLevel, app.rules);
  if (isWarn(verdict)) {
    for (const line of formatWarning(command, verdict.reasons)) app.terminal.print(line);
  } else {
    app.terminal.print(success(`No rule flags this command at safety level ${app.config.safetyLevel}`));
  }

  try {
    const analysis = await app.runtime.advise('safety-analysis', command);
    app.terminal.print();
    app.terminal.print('🔍 Model analysis:');
    app.terminal.print(analysis);
    app.terminal.print();
    return 0;
  } catch (error) {
    return reportModelError(app, error);
  }
}

// ─── Backend ────────────────────────────────────────────

export async function testConnection(app: Termsage, model: string = app.config.model): Promise<number> {
  const { terminal, client } = app;
  terminal.print('Testing connection to Ollama...');
  terminal.print(`Model: ${model}`);
  terminal.print(`API URL: ${client.baseUrl}`);
  terminal.print();

  if (!await client.isReachable()) {
    terminal.print(failure('Ollama is not running or not accessible'));
    terminal.print('Please start Ollama with: ollama serve');
    return 1;
  }
  terminal.print(success('Ollama is running'));

  try {
    if (!await client.hasModel(model)) {
      terminal.print(failure(`Model '${model}' is not available`));
      terminal.print(`To pull it, run: ollama pull ${model}`);
      return 1;
    }
    terminal.print(success(`Model '${model}' is available`));

    terminal.print();
    terminal.print('Testing with a simple prompt...');
    const response = await client.generate("Say 'Hello from termsage!'", { model });
    terminal.print(success('Test successful!'));
    terminal.print(`Response: ${response.trim()}`);
    return 0;
  } catch (error) {
    terminal.print(failure('Test failed'));
    return reportModelError(app, error);
  }
}

export async function listModels(app: Termsage): Promise<number> {
  try {
    const models = await app.client.listModels();
    app.terminal.print('Available models:');
    if (models.length === 0) {
      app.terminal.print(dim('  (none pulled yet, try: ollama pull llama2)'));
    }
    for (const name of models) {
      app.terminal.print(modelMatches(name, app.config.model)
        ? `  ${chalk.green(name)} (default)`
        : `  ${name}`);
    }
    return 0;
  } catch (error) {
    return reportModelError(app, error);
  }
}

// ─── Safety ─────────────────────────────────────────────

export async function safetyCommand(app: Termsage, level?: string): Promise<number> {
  if (level === undefined) {
    app.terminal.print(`Current safety level: ${app.config.safetyLevel}`);
    app.terminal.print(SAFETY_DESCRIPTIONS[app.config.safetyLevel]);
    return 0;
  }

  const normalized = level.toLowerCase();
  if (!isSafetyLevel(normalized)) {
    app.terminal.print(failure(`Invalid safety level '${level}'`));
    app.terminal.print(`Valid levels: ${SAFETY_LEVELS.join(', ')}`);
    app.terminal.print();
    app.terminal.print(`Current level: ${app.config.safetyLevel}`);
    app.terminal.print(SAFETY_DESCRIPTIONS[app.config.safetyLevel]);
    return 1;
  }

  await app.store.set('safety_level', normalized);
  app.terminal.print(`Safety level set to: ${normalized}`);
  app.terminal.print(SAFETY_DESCRIPTIONS[normalized]);
  return 0;
}

/** Classify the sample commands at the current level */
export function safetyTest(app: Termsage): number {
  const level = app.config.safetyLevel;
  app.terminal.print(`Testing command validation with current safety level: ${level}`);
  app.terminal.print(SAFETY_DESCRIPTIONS[level]);
  app.terminal.print();

  for (const command of SAFETY_SAMPLES) {
    const verdict = classify(command, level, app.rules);
    if (isWarn(verdict)) {
      app.terminal.print(`${chalk.red('✗ UNSAFE')}  ${command}`);
      for (const reason of verdict.reasons) app.terminal.print(dim(`    - ${reason}`));
    } else {
      app.terminal.print(`${chalk.green('✓ SAFE')}    ${command}`);
    }
  }
  return 0;
}

// ─── History ────────────────────────────────────────────

export async function historyCommand(app: Termsage, arg?: string): Promise<number> {
  if (arg === 'clear') {
    await app.history.clear();
    app.terminal.print('History cleared.');
    return 0;
  }

  const count = arg === undefined ? 10 : Number(arg);
  if (!Number.isInteger(count) || count < 1) {
    app.terminal.print(failure(`Invalid history count '${arg}'. Use a positive number or 'clear'.`));
    return 1;
  }

  const entries = await app.history.recent(count);
  if (entries.length === 0) {
    app.terminal.print('No history found.');
    return 0;
  }

  app.terminal.print(`Recent termsage history (last ${count} entries):`);
  app.terminal.print();
  for (const entry of entries) {
    app.terminal.print(chalk.cyan(`[${entry.timestamp.toLocaleString()}]`));
    app.terminal.print(`Query: ${entry.query}`);
    app.terminal.print(`Command: ${chalk.green(entry.command)}`);
    app.terminal.print();
  }
  return 0;
}

// ─── Config ─────────────────────────────────────────────

export async function configCommand(app: Termsage, action?: string, key?: string, value?: string): Promise<number> {
  const { terminal, store } = app;

  if (action === undefined) {
    const config = store.snapshot();
    terminal.print('termsage configuration:');
    terminal.print();
    terminal.print('Ollama settings:');
    terminal.print(`  Model: ${config.model}`);
    terminal.print(`  Backend URL: ${config.backendUrl}`);
    terminal.print(`  Temperature: ${config.temperature}`);
    terminal.print();
    terminal.print('Safety settings:');
    terminal.print(`  Safety level: ${config.safetyLevel}`);
    terminal.print(`  Auto-confirm: ${config.autoConfirm}`);
    terminal.print();
    terminal.print('History settings:');
    terminal.print(`  History enabled: ${config.historyEnabled}`);
    terminal.print(`  Max history: ${config.maxHistory}`);
    terminal.print();
    terminal.print('Misc settings:');
    terminal.print(`  Verbose: ${config.verbose}`);
    terminal.print();
    terminal.print(`Config file: ${store.configPath}`);
    terminal.print(`History file: ${app.history.filePath}`);
    return 0;
  }

  if (action === 'get' && key !== undefined) {
    terminal.print(store.get(key));
    return 0;
  }

  if (action === 'set' && key !== undefined && value !== undefined) {
    await store.set(key, value);
    terminal.print(success(`Set ${key} = ${store.get(key)}`));
    return 0;
  }

  terminal.print('Usage: termsage config [get <key> | set <key> <value>]');
  terminal.print(`Keys: ${CONFIG_KEYS.join(', ')}`);
  return 1;
}

// ─── System check ───────────────────────────────────────

export async function checkCommand(app: Termsage): Promise<number> {
  const { terminal, client, config } = app;
  const ok = (message: string) => terminal.print(`  ${chalk.green('✓')} ${message}`);
  const bad = (message: string) => terminal.print(`  ${chalk.red('✗')} ${message}`);
  let healthy = true;

  terminal.print(chalk.cyan('termsage System Check'));
  terminal.print('=====================');
  terminal.print();

  terminal.print('Ollama:');
  if (await client.isReachable()) {
    ok(`Ollama is running at ${client.baseUrl}`);
    try {
      if (await client.hasModel(config.model)) {
        ok(`Model '${config.model}' is available`);
      } else {
        bad(`Model '${config.model}' is not available`);
        healthy = false;
      }
    } catch (error) {
      bad(`Could not list models: ${describeError(error)}`);
      healthy = false;
    }
  } else {
    bad(`Ollama is not running at ${client.baseUrl}`);
    healthy = false;
  }

  terminal.print();
  terminal.print('Configuration:');
  ok(`Config file: ${app.store.configPath}`);
  ok(`Safety level: ${config.safetyLevel}`);
  ok(`Danger rules: v${app.rules.version} (${app.rules.rules.length} rules)`);

  terminal.print();
  terminal.print('History:');
  if (config.historyEnabled) {
    ok(`${await app.history.size()} of ${config.maxHistory} entries in ${app.history.filePath}`);
  } else {
    ok('History is disabled');
  }

  terminal.print();
  terminal.print(healthy ? success('All checks passed') : failure('Some checks failed'));
  return healthy ? 0 : 1;
}
