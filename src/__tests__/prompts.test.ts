import { describe, it, expect } from 'vitest';
import { composePrompt, renderEnvironment, renderHistory } from '../core/prompts.js';
import type { PromptTask } from '../core/prompts.js';
import type { Context } from '../core/types.js';

const context: Context = {
  cwd: '/home/dev/app',
  history: [
    { timestamp: new Date(0), query: 'show git status', command: 'git status' },
    { timestamp: new Date(1000), query: 'show disk usage', command: 'df -h' },
  ],
  git: { branch: 'main', modifiedCount: 3 },
  projectType: 'Node.js/JavaScript project',
  listing: ['package.json', 'src/'],
};

const emptyContext: Context = { cwd: '/tmp', history: [], listing: [] };

function userPart(prompt: string): string {
  // Instruction blocks never end with a query line, so the last paragraph(s) hold the task
  return prompt.slice(prompt.lastIndexOf('\n\n') + 2);
}

describe('renderHistory', () => {
  it('should pair queries with commands', () => {
    expect(renderHistory(context.history)).toBe(
      'Previous query: show git status\nPrevious command: git status\n\n'
      + 'Previous query: show disk usage\nPrevious command: df -h',
    );
  });
});

describe('renderEnvironment', () => {
  it('should include every known field', () => {
    expect(renderEnvironment(context)).toBe([
      'Current directory: /home/dev/app',
      'Git repository (branch: main, modified files: 3)',
      'Project type: Node.js/JavaScript project',
      '',
      'Files in current directory:',
      'package.json',
      'src/',
    ].join('\n'));
  });

  it('should omit absent fields', () => {
    expect(renderEnvironment(emptyContext)).toBe('Current directory: /tmp');
  });
});

describe('composePrompt', () => {
  it('should ask for the bare command when there is no history', () => {
    const prompt = composePrompt({ template: 'generate', query: 'list files sorted by size', context: emptyContext });
    expect(prompt).toContain('1. Provide ONLY the command with no explanation or additional text');
    expect(prompt).toContain('2. Do not include any markdown formatting, backticks, or code blocks');
    expect(userPart(prompt)).toBe('Convert the following query to a terminal command: list files sorted by size');
  });

  it('should weave recent history into generate', () => {
    const prompt = composePrompt({ template: 'generate', query: 'free memory', context });
    expect(prompt).toContain(
      "Here are some recent commands I've run for context:\n\nPrevious query: show git status\n",
    );
    expect(prompt).toContain('Current directory: /home/dev/app\n\n');
    expect(prompt.endsWith(
      'Based on this context and my current working directory, convert the following query to a terminal command: free memory',
    )).toBe(true);
  });

  it('should embed the environment in contextual-generate', () => {
    const prompt = composePrompt({ template: 'contextual-generate', query: 'run the tests', context });
    expect(prompt).toContain('Environment context:\nCurrent directory: /home/dev/app\nGit repository (branch: main, modified files: 3)');
    expect(prompt.endsWith('src/\n\nGenerate a command for this query: run the tests')).toBe(true);
  });

  it('should fall back to the bare query for history-analysis without history', () => {
    const prompt = composePrompt({ template: 'history-analysis', query: 'next step', context: emptyContext });
    expect(userPart(prompt)).toBe('Generate a command for this query: next step');
  });

  it('should render the command-centred templates', () => {
    expect(userPart(composePrompt({ template: 'explain', command: 'du -sh *' })))
      .toBe('Explain the following terminal command in detail: du -sh *');
    expect(composePrompt({ template: 'improve', command: 'ls', feedback: 'include hidden files' }).endsWith(
      'Here is a command: ls\n\nBased on this feedback: "include hidden files", improve the command.',
    )).toBe(true);
    expect(userPart(composePrompt({ template: 'alternatives', command: 'grep -r foo .' })))
      .toBe('Provide alternative commands that accomplish the same task as: grep -r foo .');
    expect(userPart(composePrompt({ template: 'safety-analysis', command: 'rm -rf /' })))
      .toBe('Analyze the following command for potential security risks and safety concerns: rm -rf /');
  });

  it('should be deterministic for every template', () => {
    const tasks: PromptTask[] = [
      { template: 'generate', query: 'q', context },
      { template: 'contextual-generate', query: 'q', context },
      { template: 'history-analysis', query: 'q', context },
      { template: 'explain', command: 'ls' },
      { template: 'improve', command: 'ls', feedback: 'f' },
      { template: 'alternatives', command: 'ls' },
      { template: 'safety-analysis', command: 'ls' },
    ];
    for (const task of tasks) {
      expect(composePrompt(task)).toBe(composePrompt(structuredClone(task)));
    }
  });
});
