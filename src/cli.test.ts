import { describe, it, expect } from 'vitest';
import { formatSelectionMarkdown, parseArgs, runSelection, toCLIOutput } from './cli.js';
import { createFileRecord } from './context/file-record.js';
import { freezeSelection } from './context/selection.js';
import { createSnapshot } from './context/snapshot.js';
import { BudgetInfeasibleError, ConfigurationError } from './lib/errors.js';

// Helper: simulate process.argv with first two entries
const argv = (...args: string[]) => ['node', 'cli.js', ...args];

const document = {
  root: 'demo',
  files: [
    { path: 'auth.go', tokenCount: 400, lastModified: 0 },
    { path: 'auth_test.go', tokenCount: 300, lastModified: 0 },
    { path: 'README.md', tokenCount: 200, lastModified: 0 },
  ],
};

const featureArgs = ['--type', 'feature', '-d', 'add auth middleware', '-k', 'auth'];

describe('parseArgs', () => {
  it('--snapshot sets the document path', () => {
    expect(parseArgs(argv('--snapshot', 'project.json'))).toMatchObject({ snapshot: 'project.json' });
  });

  it('-s short form works', () => {
    expect(parseArgs(argv('-s', '-'))).toMatchObject({ snapshot: '-' });
  });

  it('collects repeated keywords and includes', () => {
    const result = parseArgs(argv('-k', 'auth', '--keyword', 'token', '-i', 'main.go', '--include', 'go.mod'));
    expect(result.keywords).toEqual(['auth', 'token']);
    expect(result.include).toEqual(['main.go', 'go.mod']);
  });

  it('only records constraint flags that were given', () => {
    expect(parseArgs(argv('--snapshot', 'p.json')).constraints).toEqual({});
    const result = parseArgs(argv(
      '--max-tokens', '4000', '--max-files', '12', '--strategy', 'dependency', '--depth', '2',
      '--min-score', '0.25', '--exclude', '*.md', '--exclude', 'vendor/**', '--no-tests', '--no-docs', '--fail-on-empty'
    ));
    expect(result.constraints).toEqual({
      maxTokens: 4000,
      maxFiles: 12,
      strategy: 'dependency',
      dependencyDepth: 2,
      minRelevanceScore: 0.25,
      excludePatterns: ['*.md', 'vendor/**'],
      includeTests: false,
      includeDocs: false,
      failOnEmpty: true,
    });
  });

  it('--type and --description set the task', () => {
    expect(parseArgs(argv('-t', 'debug', '-d', 'login fails'))).toMatchObject({ type: 'debug', description: 'login fails' });
  });

  it('reports unknown task types and strategies', () => {
    expect(parseArgs(argv('--type', 'deploy', '--strategy', 'fastest')).problems).toEqual([
      'Unknown task type: deploy',
      'Unknown strategy: fastest',
    ]);
  });

  it('--output accepts json and markdown only', () => {
    expect(parseArgs(argv('-o', 'markdown'))).toMatchObject({ output: 'markdown' });
    expect(parseArgs(argv('--output', 'xml')).output).toBeUndefined();
  });

  it('--adaptive, --verbose and --help set flags', () => {
    expect(parseArgs(argv('--adaptive', '-v', '-h'))).toMatchObject({ adaptive: true, verbose: true, help: true });
  });
});

describe('runSelection', () => {
  const paths = (args: string[], env: NodeJS.ProcessEnv = {}) =>
    runSelection(parseArgs(argv(...args)), document, env).selection.files.map((entry) => entry.file.path);

  it('selects within the flag budget', () => {
    expect(paths([...featureArgs, '--max-tokens', '500', '--strategy', 'relevance'])).toEqual(['auth.go']);
  });

  it('reads default constraints from the environment', () => {
    const env = { CONTEXT_MAX_TOKENS: '500', CONTEXT_STRATEGY: 'relevance' };
    expect(paths(featureArgs, env)).toEqual(['auth.go']);
    expect(paths([...featureArgs, '--max-tokens', '10000'], env)).toEqual(['auth.go', 'auth_test.go', 'README.md']);
  });

  it('adaptive mode targets the suggested budget', () => {
    const run = runSelection(parseArgs(argv(...featureArgs, '--adaptive')), document, {});
    expect(run.selection.budget.maxTokens).toBe(4000);
    expect(run.selection.totalTokens).toBe(900);
  });

  it('reports must-include paths that are not in the snapshot', () => {
    const run = runSelection(parseArgs(argv(...featureArgs, '-i', 'missing.go')), document, {});
    expect(run.selection.diagnostics).toEqual(['must-include path not found: missing.go']);
  });

  it('throws for an empty selection with --fail-on-empty', () => {
    const args = parseArgs(argv(...featureArgs, '--max-tokens', '50', '--fail-on-empty'));
    expect(() => runSelection(args, document, {})).toThrow(BudgetInfeasibleError);
    expect(() => runSelection(args, document, {})).toThrow('No file fits a budget of 50 tokens (smallest candidate needs 200 tokens)');
  });

  it('throws for invalid documents and flag values', () => {
    expect(() => runSelection(parseArgs(argv()), { files: 'none' }, {})).toThrow(ConfigurationError);
    expect(() => runSelection(parseArgs(argv('--max-tokens', 'lots')), document, {})).toThrow(
      'Invalid constraints: maxTokens: Expected number, received nan'
    );
  });
});

describe('toCLIOutput', () => {
  it('maps the run to snake_case JSON', () => {
    const run = runSelection(parseArgs(argv(...featureArgs, '--max-tokens', '500', '--strategy', 'relevance')), document, {});
    const output = toCLIOutput(run);

    expect(output.success).toBe(true);
    expect(output.project).toMatchObject({ root: 'demo', total_files: 3, total_tokens: 900 });
    expect(output.selection).toMatchObject({
      strategy: 'relevance',
      total_files: 1,
      total_tokens: 400,
      max_tokens: 500,
      max_files: 50,
      adaptation_reasons: [],
      diagnostics: [],
    });
    expect(output.selection?.files.map((f) => [f.path, f.tokens, f.reason])).toEqual([['auth.go', 400, 'ranked']]);
  });
});

describe('formatSelectionMarkdown', () => {
  const snapshot = createSnapshot({
    root: 'demo',
    files: [
      createFileRecord({ path: 'auth.go', tokenCount: 400, lastModified: 0 }),
      createFileRecord({ path: 'README.md', tokenCount: 200, lastModified: 0 }),
    ],
  });

  it('renders a table with reasons and diagnostics', () => {
    const selection = freezeSelection({
      files: [{ file: snapshot.files[1], score: 0.775, reason: 'ranked' }],
      strategy: 'relevance',
      adaptationReasons: ['selection used 400 of 4000 target tokens; retrying with dependency strategy'],
      diagnostics: ['must-include path not found: main.go'],
      maxTokens: 4000,
      maxFiles: 50,
      projectFingerprint: snapshot.fingerprint,
    });

    expect(formatSelectionMarkdown({ snapshot, selection })).toBe([
      '## Context Selection',
      '',
      '**Strategy:** relevance | **Files:** 1/2 | **Tokens:** 400/4000',
      '',
      '| File | Tokens | Score | Reason |',
      '|------|--------|-------|--------|',
      '| `auth.go` | 400 | 0.78 | ranked |',
      '',
      '### Adaptations',
      '',
      '- selection used 400 of 4000 target tokens; retrying with dependency strategy',
      '',
      '### Diagnostics',
      '',
      '- must-include path not found: main.go',
    ].join('\n'));
  });

  it('notes an empty selection', () => {
    const selection = freezeSelection({
      files: [],
      strategy: 'balanced',
      adaptationReasons: [],
      diagnostics: [],
      maxTokens: 50,
      maxFiles: 50,
      projectFingerprint: snapshot.fingerprint,
    });

    expect(formatSelectionMarkdown({ snapshot, selection })).toBe(
      '## Context Selection\n\n**Strategy:** balanced | **Files:** 0/2 | **Tokens:** 0/50\n\n_No files selected._'
    );
  });
});
