// ═══════════════════════════════════════════════════════════
// TERMSAGE — Terminal
// User-facing lines out, one answer line in
// ═══════════════════════════════════════════════════════════

import { createInterface } from 'node:readline';
import chalk from 'chalk';

export interface Terminal {
  print(line?: string): void;
  /** Show `question` and wait, without timeout, for one line */
  ask(question: string): Promise<string>;
}

/** Terminal on stdin/stdout; EOF before an answer reads as an empty line */
export function createConsoleTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal {
  return {
    print(line = '') {
      output.write(line + '\n');
    },

    ask(question) {
      return new Promise(resolve => {
        const rl = createInterface({ input, output });
        let settled = false;

        rl.question(question, answer => {
          settled = true;
          rl.close();
          resolve(answer);
        });

        rl.on('close', () => {
          if (!settled) resolve('');
        });
      });
    },
  };
}

// ─── Formatting ─────────────────────────────────────────

export function formatCommand(command: string): string {
  return chalk.green.bold(`  ${command}`);
}

/** Block shown before confirming a flagged command */
export function formatWarning(command: string, reasons: string[]): string[] {
  return [
    chalk.yellow('⚠️  Warning: This command may be potentially dangerous:'),
    `    ${chalk.red(command)}`,
    '',
    'Potential risks:',
    ...reasons.map(reason => `  • ${reason}`),
    '',
    `Run '${chalk.cyan(`termsage explain "${command}"`)}' for a detailed explanation before executing.`,
  ];
}

export const success = (message: string) => chalk.green(`✅ ${message}`);
export const failure = (message: string) => chalk.red(`❌ ${message}`);
export const notice = (message: string) => chalk.yellow(`⚠️  ${message}`);
export const dim = (message: string) => chalk.dim(message);
