#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════
// TERMSAGE — CLI Entry Point
// Say what you want, get the command, decide whether it runs
// ═══════════════════════════════════════════════════════════

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { createTermsage } from '../index.js';
import type { Termsage, TermsageOptions } from '../index.js';
import { TermsageError, describeError } from '../core/errors.js';
import { failure } from '../core/terminal.js';
import {
  alternativesCommand,
  analyzeCommand,
  checkCommand,
  configCommand,
  explainCommand,
  generateCommand,
  historyCommand,
  improveCommand,
  listModels,
  safetyCommand,
  safetyTest,
  testConnection,
} from './actions.js';

// ─── Banner ─────────────────────────────────────────────

const BANNER = `
${chalk.cyan('    ┌─────────────────────────────────────┐')}
${chalk.cyan('    │')}                                     ${chalk.cyan('│')}
${chalk.cyan('    │')}    ${chalk.white.bold('💻  T E R M S A G E')}              ${chalk.cyan('│')}
${chalk.cyan('    │')}    ${chalk.dim('Plain words in, shell commands out')}${chalk.cyan('│')}
${chalk.cyan('    │')}                                     ${chalk.cyan('│')}
${chalk.cyan('    └─────────────────────────────────────┘')}
`;

// ─── Options ────────────────────────────────────────────

interface GlobalOptions {
  model?: string;
  timeout?: number;
  dryRun?: boolean;
  dataDir?: string;
  workflow?: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

const program = new Command();

function appOptions(): TermsageOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    model: opts.model,
    timeoutMs: opts.timeout === undefined ? undefined : opts.timeout * 1000,
    dryRun: opts.dryRun,
    dataDir: opts.dataDir,
  };
}

/** Build the app, run one action, record its exit code */
async function execute(action: (app: Termsage) => Promise<number> | number): Promise<void> {
  const app = await createTermsage(appOptions());
  process.exitCode = await action(app);
}

// ─── Interactive Default Command ────────────────────────

type MenuAction = 'generate' | 'workflow' | 'explain' | 'history' | 'test' | 'check' | 'quit';

async function askText(message: string): Promise<string> {
  const { text } = await inquirer.prompt<{ text: string }>([{ type: 'input', name: 'text', message }]);
  return text;
}

async function interactiveStart(): Promise<void> {
  console.log(BANNER);

  const { action } = await inquirer.prompt<{ action: MenuAction }>([{
    type: 'list',
    name: 'action',
    message: 'What do you want to do?',
    choices: [
      { name: '💡  Turn a request into a command', value: 'generate' },
      { name: '🔁  Suggest the next step from history', value: 'workflow' },
      { name: '📖  Explain a command', value: 'explain' },
      { name: '🕘  Show history', value: 'history' },
      { name: '🔌  Test the Ollama connection', value: 'test' },
      { name: '🩺  System check', value: 'check' },
      { name: '👋  Quit', value: 'quit' },
    ],
  }]);

  switch (action) {
    case 'generate': {
      const query = await askText('Describe what you want to do:');
      await execute(app => generateCommand(app, query));
      break;
    }

    case 'workflow': {
      const query = await askText('What comes next?');
      await execute(app => generateCommand(app, query, { workflow: true }));
      break;
    }

    case 'explain': {
      const command = await askText('Command to explain:');
      await execute(app => explainCommand(app, command));
      break;
    }

    case 'history':
      await execute(app => historyCommand(app));
      break;

    case 'test':
      await execute(app => testConnection(app));
      break;

    case 'check':
      await execute(app => checkCommand(app));
      break;

    case 'quit':
      console.log(chalk.dim('\n  Bye.\n'));
      break;
  }
}

// ─── Commander ──────────────────────────────────────────

program
  .name('termsage')
  .description('💻 termsage: natural language to shell commands with a local Ollama model')
  .version('0.1.0')
  .option('-m, --model <name>', 'Model to use for this run')
  .option('-t, --timeout <seconds>', 'Model request timeout in seconds', parseSeconds)
  .option('-n, --dry-run', 'Show and log the command without running it')
  .option('-d, --data-dir <path>', 'Directory holding config.yaml and history.txt')
  .option('-w, --workflow', 'Read recent history to suggest the next step')
  .argument('[query...]', 'What you want to do, in plain words')
  .action(async (query: string[]) => {
    if (query.length === 0) {
      await interactiveStart();
      return;
    }
    const { workflow } = program.opts<GlobalOptions>();
    await execute(app => generateCommand(app, query.join(' '), { workflow }));
  });

program
  .command('run')
  .description('Turn a request into a command (same as the bare form)')
  .argument('<query...>')
  .action(async (query: string[]) => {
    const { workflow } = program.opts<GlobalOptions>();
    await execute(app => generateCommand(app, query.join(' '), { workflow }));
  });

program
  .command('explain')
  .description('Explain what a command does')
  .argument('<command...>')
  .action(async (command: string[]) => {
    await execute(app => explainCommand(app, command.join(' ')));
  });

program
  .command('improve')
  .description('Rework a command according to feedback')
  .argument('<command>', 'The command, quoted')
  .argument('<feedback...>')
  .action(async (command: string, feedback: string[]) => {
    await execute(app => improveCommand(app, command, feedback.join(' ')));
  });

program
  .command('alternatives')
  .description('Suggest other ways to do the same thing')
  .argument('<command...>')
  .action(async (command: string[]) => {
    await execute(app => alternativesCommand(app, command.join(' ')));
  });

program
  .command('analyze')
  .description('Check a command against the danger rules and ask the model for a risk analysis')
  .argument('<command...>')
  .action(async (command: string[]) => {
    await execute(app => analyzeCommand(app, command.join(' ')));
  });

program
  .command('test')
  .description('Test the connection to Ollama')
  .argument('[model]')
  .action(async (model?: string) => {
    await execute(app => testConnection(app, model));
  });

program
  .command('models')
  .description('List the models Ollama has pulled')
  .action(async () => {
    await execute(app => listModels(app));
  });

program
  .command('safety')
  .description("Show or set the safety level; 'safety test' classifies sample commands")
  .argument('[level]', 'low, medium, high or test')
  .action(async (level?: string) => {
    await execute(app => level === 'test' ? safetyTest(app) : safetyCommand(app, level));
  });

program
  .command('history')
  .description("Show recent history, or 'history clear'")
  .argument('[count]', "Number of entries, or 'clear'")
  .action(async (count?: string) => {
    await execute(app => historyCommand(app, count));
  });

program
  .command('config')
  .description('Show, get or set configuration')
  .argument('[action]', 'get or set')
  .argument('[key]')
  .argument('[value]')
  .action(async (action?: string, key?: string, value?: string) => {
    await execute(app => configCommand(app, action, key, value));
  });

program
  .command('check')
  .alias('status')
  .description('Check Ollama, the model, configuration and history')
  .action(async () => {
    await execute(app => checkCommand(app));
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof TermsageError) {
    console.error(failure(describeError(error)));
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
