// ═══════════════════════════════════════════════════════════
// TERMSAGE — Prompt Composer
// Task + context → one prompt string. Pure, no I/O.
// ═══════════════════════════════════════════════════════════

import type { Context, HistoryEntry } from './types.js';

export type PromptTemplate =
  | 'generate'
  | 'contextual-generate'
  | 'history-analysis'
  | 'explain'
  | 'improve'
  | 'alternatives'
  | 'safety-analysis';

export type PromptTask =
  | { template: 'generate'; query: string; context?: Context }
  | { template: 'contextual-generate'; query: string; context: Context }
  | { template: 'history-analysis'; query: string; context: Context }
  | { template: 'explain'; command: string }
  | { template: 'improve'; command: string; feedback: string }
  | { template: 'alternatives'; command: string }
  | { template: 'safety-analysis'; command: string };

// ─── Instruction blocks ─────────────────────────────────

const COMMAND_ONLY_RULES = [
  'Provide ONLY the command with no explanation or additional text',
  'Do not include any markdown formatting, backticks, or code blocks',
];

function numbered(rules: string[]): string {
  return rules.map((rule, i) => `${i + 1}. ${rule}`).join('\n');
}

const GENERATE_INSTRUCTIONS = `You are a helpful assistant that converts natural language requests into terminal commands. Produce the single most appropriate command for the request.

IMPORTANT RULES:
${numbered([
  ...COMMAND_ONLY_RULES,
  'Generate commands that are safe and commonly used',
  'Prefer standard Unix/Linux commands that work across different systems',
  'If the request is ambiguous, choose the most common interpretation',
  'Do not use sudo unless the request explicitly asks for it',
  'Make sure the command is syntactically correct and executable',
  'Take the current working directory and recent commands into account when relevant',
  'Use relative paths when appropriate',
])}

Examples:
Query: "list all files sorted by size"
Response: ls -laSh

Query: "find all python files"
Response: find . -name "*.py"

Query: "show disk usage"
Response: df -h

Query: "count lines in all text files"
Response: find . -name "*.txt" -exec wc -l {} +`;

const CONTEXTUAL_INSTRUCTIONS = `You are a context-aware assistant that generates terminal commands from the user's current environment. Consider the current directory, the files present and the project type.

IMPORTANT RULES:
${numbered([
  ...COMMAND_ONLY_RULES,
  'Consider the current working directory and its files',
  'Use relative paths when appropriate',
  'Adapt the command to the apparent project type',
  'Use the project\'s own tooling for project tasks (npm, pip, cargo, go, make, ...)',
  'Consider the git state when the request concerns version control',
])}`;

const HISTORY_INSTRUCTIONS = `You are an assistant that reads the user's recent command history to understand their workflow and suggests the command that fits it.

IMPORTANT RULES:
${numbered([
  ...COMMAND_ONLY_RULES,
  'Use the recent commands to understand the task in progress',
  'Generate a command that follows logically from that activity',
  'Stay consistent with the tools and patterns the user prefers',
])}`;

const EXPLAIN_INSTRUCTIONS = `You are a helpful assistant that explains terminal commands. Give a clear, complete explanation of what the command does, part by part.

EXPLANATION FORMAT:
${numbered([
  'Start with a one-sentence summary of what the command does',
  'Break the command down and explain each part',
  'Describe every flag and option used',
  'Describe the expected output or result',
  'Point out any risks or side effects',
  'Mention related commands or alternatives if useful',
])}

Keep the explanation accessible to users who are not experts.`;

const IMPROVE_INSTRUCTIONS = `You are a helpful assistant that improves terminal commands based on user feedback. Modify the command so it better matches what the user wants.

IMPORTANT RULES:
${numbered([
  'Provide ONLY the improved command with no explanation or additional text',
  'Do not include any markdown formatting, backticks, or code blocks',
  'Address the feedback directly',
  'Keep the core behaviour of the original command unless the feedback says otherwise',
  'Make sure the improved command is syntactically correct',
])}`;

const ALTERNATIVES_INSTRUCTIONS = `You are a helpful assistant that suggests other ways to do the same thing in a terminal.

IMPORTANT RULES:
${numbered([
  'Provide ONLY the alternative commands, one per line',
  'Do not include any markdown formatting, backticks, or code blocks',
  'Do not include explanations or numbering',
  'Provide 2-3 practical alternatives',
  'Make sure every alternative is syntactically correct',
  'Prefer different tools or approaches over small flag changes',
])}`;

const SAFETY_INSTRUCTIONS = `You are a security-focused assistant that reviews terminal commands for risk.

ANALYSIS FORMAT:
${numbered([
  'Overall risk level (LOW/MEDIUM/HIGH)',
  'Specific risks identified',
  'Potential consequences',
  'Safer alternatives, if any',
  'Recommendations for running it safely',
])}

Be thorough and err on the side of caution.`;

// ─── Context rendering ──────────────────────────────────

export function renderHistory(entries: HistoryEntry[]): string {
  return entries
    .map(entry => `Previous query: ${entry.query}\nPrevious command: ${entry.command}`)
    .join('\n\n');
}

export function renderEnvironment(context: Context): string {
  const lines = [`Current directory: ${context.cwd}`];
  if (context.git) {
    lines.push(`Git repository (branch: ${context.git.branch}, modified files: ${context.git.modifiedCount})`);
  }
  if (context.projectType) {
    lines.push(`Project type: ${context.projectType}`);
  }
  if (context.listing.length > 0) {
    lines.push('', 'Files in current directory:', ...context.listing);
  }
  return lines.join('\n');
}

function userInstruction(task: PromptTask): string {
  switch (task.template) {
    case 'generate': {
      const history = task.context?.history ?? [];
      if (history.length === 0) {
        return `Convert the following query to a terminal command: ${task.query}`;
      }
      return `Here are some recent commands I've run for context:\n\n${renderHistory(history)}\n\n`
        + `Current directory: ${task.context?.cwd ?? '.'}\n\n`
        + `Based on this context and my current working directory, convert the following query to a terminal command: ${task.query}`;
    }

    case 'contextual-generate':
      return `Environment context:\n${renderEnvironment(task.context)}\n\nGenerate a command for this query: ${task.query}`;

    case 'history-analysis':
      if (task.context.history.length === 0) {
        return `Generate a command for this query: ${task.query}`;
      }
      return `Based on this command history:\n\n${renderHistory(task.context.history)}\n\nGenerate a command for this query: ${task.query}`;

    case 'explain':
      return `Explain the following terminal command in detail: ${task.command}`;

    case 'improve':
      return `Here is a command: ${task.command}\n\nBased on this feedback: "${task.feedback}", improve the command.`;

    case 'alternatives':
      return `Provide alternative commands that accomplish the same task as: ${task.command}`;

    case 'safety-analysis':
      return `Analyze the following command for potential security risks and safety concerns: ${task.command}`;
  }
}

const INSTRUCTIONS: Record<PromptTemplate, string> = {
  'generate': GENERATE_INSTRUCTIONS,
  'contextual-generate': CONTEXTUAL_INSTRUCTIONS,
  'history-analysis': HISTORY_INSTRUCTIONS,
  'explain': EXPLAIN_INSTRUCTIONS,
  'improve': IMPROVE_INSTRUCTIONS,
  'alternatives': ALTERNATIVES_INSTRUCTIONS,
  'safety-analysis': SAFETY_INSTRUCTIONS,
};

/** Render the full prompt: instruction block, blank line, user instruction */
export function composePrompt(task: PromptTask): string {
  return `${INSTRUCTIONS[task.template]}\n\n${userInstruction(task)}`;
}
