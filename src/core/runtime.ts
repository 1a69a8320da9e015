// ═══════════════════════════════════════════════════════════
// TERMSAGE — Core Runtime
// Query in → context → prompt → model → verdict → decision → shell
// ═══════════════════════════════════════════════════════════

import type {
  CommandTask,
  Context,
  FailureReason,
  PipelineOutcome,
  PipelineState,
  Query,
  RiskVerdict,
  TermsageConfig,
} from './types.js';
import type { ModelClient } from './llm.js';
import type { HistoryStore } from '../history/history-store.js';
import type { CompiledRuleTable } from '../safety/rules.js';
import type { CommandRunner } from './executor.js';
import type { GitRunner } from './context.js';
import type { Logger } from './logger.js';
import type { Terminal } from './terminal.js';
import type { PromptTask } from './prompts.js';
import { EmptyOutputError, HistoryError, ModelUnavailableError, TransportError, describeError, isModelClientError } from './errors.js';
import { buildContext } from './context.js';
import { composePrompt } from './prompts.js';
import { sanitize } from './sanitizer.js';
import { classify } from '../safety/classifier.js';
import { getDefaultRuleTable } from '../safety/rules.js';
import { runCommand } from './executor.js';
import { modelMatches } from './llm.js';
import { silentLogger } from './logger.js';
import { dim, failure, formatCommand, formatWarning, notice, success } from './terminal.js';

export const CONFIRM_QUESTION = 'Execute this command? [y/N] ';

/** Only a lone y or Y counts as consent */
export function isAffirmative(answer: string): boolean {
  return /^[Yy]$/.test(answer.trim());
}

export function createQuery(text: string, timestamp: Date = new Date()): Query {
  return Object.freeze({ text, timestamp });
}

export interface RuntimeOptions {
  config: TermsageConfig;
  client: ModelClient;
  terminal: Terminal;
  /** Omit to run without history */
  history?: Pick<HistoryStore, 'append' | 'recent'>;
  /** Recent entries shown to the model; defaults to 5 */
  historyLimit?: number;
  rules?: CompiledRuleTable;
  runCommand?: CommandRunner;
  git?: GitRunner;
  cwd?: string;
  /** Stop after logging and print the command instead of running it */
  dryRun?: boolean;
  logger?: Logger;
}

/** Free-text tasks whose answer is shown, never executed */
export type AdviceTemplate = 'explain' | 'alternatives' | 'safety-analysis';

export class CommandRuntime {
  private readonly config: TermsageConfig;
  private readonly client: ModelClient;
  private readonly terminal: Terminal;
  private readonly history?: Pick<HistoryStore, 'append' | 'recent'>;
  private readonly historyLimit?: number;
  private readonly rules: CompiledRuleTable;
  private readonly runCommand: CommandRunner;
  private readonly git?: GitRunner;
  private readonly cwd: string;
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: RuntimeOptions) {
    this.config = options.config;
    this.client = options.client;
    this.terminal = options.terminal;
    this.history = options.history;
    this.historyLimit = options.historyLimit;
    this.rules = options.rules ?? getDefaultRuleTable();
    this.runCommand = options.runCommand ?? runCommand;
    this.git = options.git;
    this.cwd = options.cwd ?? process.cwd();
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  private get historyActive(): boolean {
    return this.config.historyEnabled && this.history !== undefined;
  }

  /** Drive one task to a terminal outcome. Every state visited is in `trace`. */
  async run(task: CommandTask): Promise<PipelineOutcome> {
    const trace: PipelineState[] = ['received'];
    const fail = (reason: FailureReason, error?: Error): PipelineOutcome => {
      trace.push('failed');
      this.logger.debug(`Failed (${reason}) after ${trace.join(' → ')}`);
      return { status: 'failed', reason, error, trace };
    };

    // ─── Context + prompt ───────────────────────────────
    const context = await buildContext({
      cwd: this.cwd,
      history: this.historyActive ? this.history : undefined,
      historyLimit: this.historyLimit,
      git: this.git,
      logger: this.logger,
    });
    trace.push('context_built');

    const prompt = composePrompt(this.promptFor(task, context));
    trace.push('prompt_composed');
    this.logger.debug(`Prompt (${prompt.length} chars) for ${task.kind}: ${task.query.text}`);

    // ─── Model ──────────────────────────────────────────
    let raw: string;
    try {
      await this.ensureModel();
      raw = await this.client.generate(prompt, {
        model: this.config.model,
        temperature: this.config.temperature,
      });
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        this.terminal.print(failure(error.message));
        this.terminal.print(dim(`Pull it with: ollama pull ${error.model}`));
        return fail('model_unavailable', error);
      }
      if (isModelClientError(error)) {
        this.terminal.print(failure(describeError(error)));
        return fail('model_error', error);
      }
      throw error;
    }
    trace.push('model_called');

    const command = sanitize(raw);
    trace.push('sanitized');
    if (command.length === 0) {
      this.terminal.print(failure('Generated command is empty after cleaning'));
      return fail('empty_command', new EmptyOutputError('Generated command is empty after cleaning'));
    }

    const verdict = classify(command, this.config.safetyLevel, this.rules);
    trace.push('classified');
    this.logger.debug(`Generated command: ${command} (${verdict.kind})`);

    // ─── Decision ───────────────────────────────────────
    this.terminal.print();
    this.terminal.print('💻 Generated command:');
    this.terminal.print(formatCommand(command));
    this.terminal.print();

    const approved = await this.decide(command, verdict, trace);

    // ─── History ────────────────────────────────────────
    trace.push(await this.record(task.query, command) ? 'logged' : 'not_logged');

    // ─── Execution ──────────────────────────────────────
    if (!approved) {
      this.terminal.print('Command not executed.');
      trace.push('skipped');
      return { status: 'skipped', command, verdict, trace };
    }

    if (this.dryRun) {
      this.terminal.print(dim(`Dry run, not executing: ${command}`));
      trace.push('skipped');
      return { status: 'skipped', command, verdict, trace };
    }

    this.terminal.print(dim('Executing command...'));
    const exitCode = await this.runCommand(command, { cwd: this.cwd });
    trace.push('executed');
    this.terminal.print(exitCode === 0
      ? success('Command executed successfully')
      : notice(`Command exited with code ${exitCode}`));

    return { status: 'executed', command, verdict, exitCode, trace };
  }

  /**
   * Ask the model for prose about a command (explanation, alternatives,
   * risk analysis). Rejects with the model client's errors.
   */
  async advise(template: AdviceTemplate, command: string): Promise<string> {
    await this.ensureModel();
    const text = await this.client.generate(composePrompt({ template, command }), {
      model: this.config.model,
      temperature: this.config.temperature,
    });
    return text.trim();
  }

  /** Alternative commands, one per entry, cleaned like any generated command */
  async alternatives(command: string): Promise<string[]> {
    const text = await this.advise('alternatives', command);
    return text
      .split('\n')
      .map(line => sanitize(line.replace(/^\s*(?:[-*•]|\d+[.)])\s+/, '')))
      .filter(line => line.length > 0);
  }

  // ─── Internals ─────────────────────────────────────────

  private promptFor(task: CommandTask, context: Context): PromptTask {
    switch (task.kind) {
      case 'generate':
        return context.history.length > 0
          ? { template: 'generate', query: task.query.text, context }
          : { template: 'contextual-generate', query: task.query.text, context };
      case 'workflow':
        return { template: 'history-analysis', query: task.query.text, context };
      case 'improve':
        return { template: 'improve', command: task.command, feedback: task.query.text };
    }
  }

  /** Probe the server, then check the configured model has been pulled */
  private async ensureModel(): Promise<void> {
    if (!await this.client.isReachable()) {
      throw new TransportError(
        'connection_failed',
        `Ollama is not reachable at ${this.client.baseUrl}. Start it with 'ollama serve'.`,
      );
    }
    const available = await this.client.listModels();
    if (!available.some(name => modelMatches(name, this.config.model))) {
      throw new ModelUnavailableError(this.config.model, available);
    }
  }

  private async decide(command: string, verdict: RiskVerdict, trace: PipelineState[]): Promise<boolean> {
    if (verdict.kind === 'safe' && this.config.autoConfirm) {
      trace.push('auto_approved');
      return true;
    }

    if (verdict.kind === 'warn') {
      for (const line of formatWarning(command, verdict.reasons)) this.terminal.print(line);
      this.terminal.print();
      if (this.config.autoConfirm) {
        this.terminal.print(notice('Auto-confirm does not apply to flagged commands.'));
      }
    }

    trace.push('awaiting_decision');
    const answer = await this.terminal.ask(CONFIRM_QUESTION);
    return isAffirmative(answer);
  }

  /** Append to history when enabled; true when an entry was written */
  private async record(query: Query, command: string): Promise<boolean> {
    if (!this.historyActive || !this.history) return false;
    try {
      await this.history.append({ timestamp: query.timestamp, query: query.text, command });
      return true;
    } catch (error) {
      if (!(error instanceof HistoryError)) throw error;
      this.logger.warn(`Could not record history: ${error.message}`);
      return false;
    }
  }
}

/** Process exit status for an outcome: only a failed pipeline is an error */
export function exitCodeFor(outcome: PipelineOutcome): number {
  return outcome.status === 'failed' ? 1 : 0;
}
