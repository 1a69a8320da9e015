// ═══════════════════════════════════════════════════════════
// TERMSAGE — Command Executor
// The only place generated text reaches a shell
// ═══════════════════════════════════════════════════════════

import { spawn } from 'node:child_process';
import { constants } from 'node:os';

export interface RunOptions {
  cwd: string;
}

/** Runs one command line and resolves with its exit status */
export type CommandRunner = (command: string, options: RunOptions) => Promise<number>;

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + constants.signals[signal];
}

/**
 * Run `command` through the user's shell with the terminal attached.
 * Resolves with the exit code (128 + n when killed by signal n); rejects
 * only when the shell itself cannot be started.
 */
export const runCommand: CommandRunner = (command, options) => new Promise((resolve, reject) => {
  const child = spawn(command, {
    shell: process.env.SHELL || true,
    cwd: options.cwd,
    stdio: 'inherit',
  });

  child.on('error', reject);
  child.on('close', (code, signal) => {
    if (code !== null) resolve(code);
    else if (signal) resolve(signalExitCode(signal));
    else resolve(1);
  });
});
