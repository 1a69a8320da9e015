// ═══════════════════════════════════════════════════════════
// TERMSAGE — Core Types
// ═══════════════════════════════════════════════════════════

/** A natural-language request, frozen at invocation */
export interface Query {
  readonly text: string;
  readonly timestamp: Date;
}

/** One remembered query → command mapping */
export interface HistoryEntry {
  timestamp: Date;
  query: string;
  command: string;
}

/** Compact git summary for the prompt */
export interface GitSummary {
  branch: string;
  modifiedCount: number;
}

/** Environment snapshot injected into prompts. Rebuilt per query. */
export interface Context {
  cwd: string;
  history: HistoryEntry[];
  git?: GitSummary;
  projectType?: string;
  /** First entries of the working directory, directories suffixed with `/` */
  listing: string[];
}

// ─── Safety ─────────────────────────────────────────────

/** Ordered from least to most strict */
export const SAFETY_LEVELS = ['low', 'medium', 'high'] as const;

export type SafetyLevel = typeof SAFETY_LEVELS[number];

export const SAFETY_RANK: Record<SafetyLevel, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

export type RiskVerdict =
  | { kind: 'safe' }
  | { kind: 'warn'; reasons: string[] };

export type MatchKind = 'substring' | 'regex';

/** A single entry of the danger rule table */
export interface DangerRule {
  id: string;
  pattern: string;
  match: MatchKind;
  /** Lowest safety level at which the rule applies */
  level: SafetyLevel;
  reason: string;
}

export interface RuleTable {
  version: string;
  rules: DangerRule[];
}

// ─── Configuration ──────────────────────────────────────

export interface TermsageConfig {
  /** Ollama model name */
  model: string;
  /** Base URL of the Ollama server */
  backendUrl: string;
  /** Sampling temperature */
  temperature: number;
  safetyLevel: SafetyLevel;
  /** Run safe commands without asking */
  autoConfirm: boolean;
  historyEnabled: boolean;
  /** Upper bound on stored history entries */
  maxHistory: number;
  verbose: boolean;
}

/** Keys as they appear in config.yaml and on the command line */
export const CONFIG_KEYS = [
  'model',
  'backend_url',
  'temperature',
  'safety_level',
  'auto_confirm',
  'history_enabled',
  'max_history',
  'verbose',
] as const;

export type ConfigKey = typeof CONFIG_KEYS[number];

// ─── Pipeline ───────────────────────────────────────────

/** What the controller is asked to turn into a command */
export type CommandTask =
  | { kind: 'generate'; query: Query }
  | { kind: 'workflow'; query: Query }
  | { kind: 'improve'; query: Query; command: string };

export type PipelineState =
  | 'received'
  | 'context_built'
  | 'prompt_composed'
  | 'model_called'
  | 'sanitized'
  | 'classified'
  | 'auto_approved'
  | 'awaiting_decision'
  | 'logged'
  | 'not_logged'
  | 'executed'
  | 'skipped'
  | 'failed';

export type FailureReason =
  | 'model_error'
  | 'model_unavailable'
  | 'empty_command';

/** Terminal result of one pipeline run */
export type PipelineOutcome =
  | {
    status: 'executed';
    command: string;
    verdict: RiskVerdict;
    exitCode: number;
    trace: PipelineState[];
  }
  | {
    status: 'skipped';
    command: string;
    verdict: RiskVerdict;
    trace: PipelineState[];
  }
  | {
    status: 'failed';
    reason: FailureReason;
    error?: Error;
    trace: PipelineState[];
  };
