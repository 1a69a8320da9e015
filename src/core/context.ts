// ═══════════════════════════════════════════════════════════
// TERMSAGE — Context Builder
// Working directory + git + project + history → Context
// ═══════════════════════════════════════════════════════════

import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Context, GitSummary, HistoryEntry } from './types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const DEFAULT_HISTORY_LIMIT = 5;
export const LISTING_LIMIT = 10;

export interface GitRunResult {
  stdout: string;
  exitCode: number;
}

/** Runs `git <args>` in `cwd` */
export type GitRunner = (args: string[], cwd: string) => Promise<GitRunResult>;

export const runGit: GitRunner = (args, cwd) => new Promise(resolve => {
  execFile('git', args, { cwd, timeout: 2_000 }, (error, stdout) => {
    if (error) {
      resolve({ stdout: '', exitCode: typeof error.code === 'number' ? error.code : 1 });
      return;
    }
    resolve({ stdout, exitCode: 0 });
  });
});

/** Marker files, checked in order; the first hit names the project */
const PROJECT_MARKERS: Array<{ files: string[]; label: string }> = [
  { files: ['package.json'], label: 'Node.js/JavaScript project' },
  { files: ['requirements.txt', 'setup.py', 'pyproject.toml'], label: 'Python project' },
  { files: ['Cargo.toml'], label: 'Rust project' },
  { files: ['go.mod'], label: 'Go project' },
  { files: ['pom.xml', 'build.gradle'], label: 'Java project' },
  { files: ['Makefile'], label: 'Project with Makefile' },
  { files: ['docker-compose.yml', 'Dockerfile'], label: 'Docker project' },
];

export function detectProjectType(cwd: string): string | undefined {
  for (const marker of PROJECT_MARKERS) {
    if (marker.files.some(file => existsSync(join(cwd, file)))) {
      return marker.label;
    }
  }
  return undefined;
}

/** Branch and modified-file count, or undefined outside a repository */
export async function detectGit(cwd: string, git: GitRunner = runGit): Promise<GitSummary | undefined> {
  const inside = await git(['rev-parse', '--is-inside-work-tree'], cwd);
  if (inside.exitCode !== 0 || inside.stdout.trim() !== 'true') return undefined;

  const branch = await git(['branch', '--show-current'], cwd);
  const status = await git(['status', '--porcelain'], cwd);

  return {
    // Detached HEAD prints nothing
    branch: branch.exitCode === 0 && branch.stdout.trim() ? branch.stdout.trim() : 'unknown',
    modifiedCount: status.exitCode === 0
      ? status.stdout.split('\n').filter(line => line.trim().length > 0).length
      : 0,
  };
}

export async function listDirectory(cwd: string, limit: number = LISTING_LIMIT): Promise<string[]> {
  const entries = await readdir(cwd, { withFileTypes: true });
  return entries
    .map(entry => entry.isDirectory() ? `${entry.name}/` : entry.name)
    .sort((a, b) => a.localeCompare(b))
    .slice(0, limit);
}

export interface ContextOptions {
  cwd: string;
  /** Where recent entries come from; omit when history is disabled */
  history?: { recent(n: number): Promise<HistoryEntry[]> };
  historyLimit?: number;
  git?: GitRunner;
  logger?: Logger;
}

/**
 * Assemble the prompt context. Each probe is best-effort: a failure leaves
 * its field empty and is only logged at debug level.
 */
export async function buildContext(options: ContextOptions): Promise<Context> {
  const { cwd, history, historyLimit = DEFAULT_HISTORY_LIMIT, git = runGit, logger = silentLogger } = options;

  const [recent, gitSummary, listing] = await Promise.all([
    history
      ? history.recent(historyLimit).catch((error: unknown) => {
        logger.debug(`History unavailable: ${String(error)}`);
        return [];
      })
      : Promise.resolve([]),
    detectGit(cwd, git).catch((error: unknown) => {
      logger.debug(`Git probe failed: ${String(error)}`);
      return undefined;
    }),
    listDirectory(cwd).catch((error: unknown) => {
      logger.debug(`Directory listing failed: ${String(error)}`);
      return [];
    }),
  ]);

  let projectType: string | undefined;
  try {
    projectType = detectProjectType(cwd);
  } catch (error) {
    logger.debug(`Project detection failed: ${String(error)}`);
  }

  const context: Context = { cwd, history: recent, listing };
  if (gitSummary) context.git = gitSummary;
  if (projectType) context.projectType = projectType;
  return context;
}
