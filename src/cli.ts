#!/usr/bin/env node
/**
 * Context Selector - CLI Entry Point
 *
 * Reads a snapshot JSON document and prints the files selected for a task.
 *
 * Usage:
 *   node dist/src/cli.js --snapshot project.json --type debug --description "login fails"
 *   cat project.json | node dist/src/cli.js --snapshot - --keyword auth --output markdown
 *   node dist/src/cli.js --help
 */

import { readFile } from 'node:fs/promises';
import { createContextEngine } from './engine/index.js';
import type { ConstraintOverrides } from './context/constraints.js';
import type { ProjectSnapshot } from './context/snapshot.js';
import { createTask } from './context/task.js';
import {
  SELECTION_STRATEGIES,
  TASK_TYPES,
  isSelectionStrategy,
  isTaskType,
  type SelectedContext,
  type TaskType,
} from './context/types.js';
import { loadEngineConfigFromEnv } from './lib/config.js';
import { BudgetInfeasibleError, ConfigurationError, describeError } from './lib/errors.js';
import { projectToJSON, selectionToJSON, type ProjectJSON, type SelectionJSON } from './lib/selection-json.js';

export interface CLIArgs {
  snapshot?: string;
  type?: TaskType;
  description?: string;
  keywords: string[];
  include: string[];
  /** Only the constraint flags that were given */
  constraints: ConstraintOverrides;
  adaptive?: boolean;
  output?: 'json' | 'markdown';
  verbose?: boolean;
  help?: boolean;
  /** Flag values that could not be used */
  problems: string[];
}

export interface CLIOutput {
  success: boolean;
  project?: ProjectJSON;
  selection?: SelectionJSON;
  error?: string;
  hint?: string;
}

export function parseArgs(argv: string[]): CLIArgs {
  const args: CLIArgs = { keywords: [], include: [], constraints: {}, problems: [] };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--snapshot' || arg === '-s') {
      args.snapshot = argv[++i];
    } else if (arg === '--type' || arg === '-t') {
      const value = argv[++i] ?? '';
      if (isTaskType(value)) {
        args.type = value;
      } else {
        args.problems.push(`Unknown task type: ${value}`);
      }
    } else if (arg === '--description' || arg === '-d') {
      args.description = argv[++i];
    } else if (arg === '--keyword' || arg === '-k') {
      const value = argv[++i];
      if (value) args.keywords.push(value);
    } else if (arg === '--include' || arg === '-i') {
      const value = argv[++i];
      if (value) args.include.push(value);
    } else if (arg === '--exclude') {
      const value = argv[++i];
      if (value) args.constraints.excludePatterns = [...(args.constraints.excludePatterns ?? []), value];
    } else if (arg === '--max-tokens') {
      args.constraints.maxTokens = parseInt(argv[++i] ?? '', 10);
    } else if (arg === '--max-files') {
      args.constraints.maxFiles = parseInt(argv[++i] ?? '', 10);
    } else if (arg === '--depth') {
      args.constraints.dependencyDepth = parseInt(argv[++i] ?? '', 10);
    } else if (arg === '--min-score') {
      args.constraints.minRelevanceScore = parseFloat(argv[++i] ?? '');
    } else if (arg === '--strategy') {
      const value = argv[++i] ?? '';
      if (isSelectionStrategy(value)) {
        args.constraints.strategy = value;
      } else {
        args.problems.push(`Unknown strategy: ${value}`);
      }
    } else if (arg === '--no-tests') {
      args.constraints.includeTests = false;
    } else if (arg === '--no-docs') {
      args.constraints.includeDocs = false;
    } else if (arg === '--fail-on-empty') {
      args.constraints.failOnEmpty = true;
    } else if (arg === '--adaptive' || arg === '-a') {
      args.adaptive = true;
    } else if (arg === '--output' || arg === '-o') {
      const value = argv[++i];
      if (value === 'json' || value === 'markdown') {
        args.output = value;
      }
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true;
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Context Selector CLI

Usage:
  context-select --snapshot <file> [options]
  cat project.json | context-select --snapshot - [options]

Options:
  -s, --snapshot <file>      Snapshot JSON document, or - for stdin (required)
  -t, --type <type>          Task type: ${TASK_TYPES.join(', ')} (default: general)
  -d, --description <text>   Task description
  -k, --keyword <word>       Task keyword (repeatable)
  -i, --include <path>       Path that must be selected (repeatable)
  --exclude <glob>           Never select matching paths (repeatable)
  --max-tokens <n>           Token budget (default: 8000)
  --max-files <n>            File limit (default: 50)
  --strategy <name>          ${SELECTION_STRATEGIES.join(', ')} (default: balanced)
  --depth <n>                Import levels followed by the dependency strategy
  --min-score <0-1>          Drop files scoring below this
  --no-tests                 Leave test files out
  --no-docs                  Leave documentation out
  --fail-on-empty            Exit with an error when nothing fits the budget
  -a, --adaptive             Retry with adjusted constraints when the budget is underused
  -o, --output <format>      Output format: json (default) or markdown
  -v, --verbose              Log selection progress
  -h, --help                 Show this help message

Environment:
  CONTEXT_MAX_TOKENS, CONTEXT_MAX_FILES, CONTEXT_STRATEGY   Default constraints
  DEBUG_CONTEXT_ENGINE=true                                 Same as --verbose

Examples:
  context-select --snapshot project.json --type debug -d "login fails after token refresh"
  context-select --snapshot project.json -k auth -i cmd/server/main.go --max-tokens 4000
  context-select --snapshot project.json --type refactor --adaptive --output markdown
`);
}

function outputJSON(result: CLIOutput): void {
  console.log(JSON.stringify(result, null, 2));
}

function outputError(error: string, hint?: string): void {
  outputJSON({
    success: false,
    error,
    hint,
  });
}

export interface SelectionRun {
  snapshot: ProjectSnapshot;
  selection: SelectedContext;
}

/**
 * Build the snapshot and run the selection the arguments describe.
 *
 * @throws ConfigurationError for an invalid document or flag values
 * @throws BudgetInfeasibleError with --fail-on-empty when nothing fits
 */
export function runSelection(args: CLIArgs, document: unknown, env: NodeJS.ProcessEnv = process.env): SelectionRun {
  const config = loadEngineConfigFromEnv(env);
  const engine = createContextEngine({ ...config, verbose: args.verbose || config.verbose });

  const snapshot = engine.loadSnapshot(document);
  const task = createTask({
    type: args.type ?? 'general',
    description: args.description ?? '',
    keywords: args.keywords,
    mustInclude: args.include,
  });
  const constraints = engine.defaults.with(args.constraints);

  if (args.adaptive) {
    const custom = Object.keys(args.constraints).length > 0;
    return {
      snapshot,
      selection: engine.adapt(snapshot, task, args.constraints.maxTokens, custom ? constraints : undefined),
    };
  }
  return { snapshot, selection: engine.select(snapshot, task, constraints) };
}

export function toCLIOutput({ snapshot, selection }: SelectionRun): CLIOutput {
  return {
    success: true,
    project: projectToJSON(snapshot),
    selection: selectionToJSON(selection),
  };
}

/**
 * Format a selection as Markdown.
 */
export function formatSelectionMarkdown({ snapshot, selection }: SelectionRun): string {
  const lines: string[] = [
    '## Context Selection',
    '',
    `**Strategy:** ${selection.strategy} | ` +
      `**Files:** ${selection.totalFiles}/${snapshot.files.length} | ` +
      `**Tokens:** ${selection.totalTokens}/${selection.budget.maxTokens}`,
    '',
  ];

  if (selection.files.length === 0) {
    lines.push('_No files selected._');
  } else {
    lines.push('| File | Tokens | Score | Reason |');
    lines.push('|------|--------|-------|--------|');
    for (const entry of selection.files) {
      lines.push(`| \`${entry.file.path}\` | ${entry.file.tokenCount} | ${entry.score.toFixed(2)} | ${entry.reason} |`);
    }
  }

  if (selection.adaptationReasons.length > 0) {
    lines.push('', '### Adaptations', '');
    for (const reason of selection.adaptationReasons) {
      lines.push(`- ${reason}`);
    }
  }

  if (selection.diagnostics.length > 0) {
    lines.push('', '### Diagnostics', '');
    for (const diagnostic of selection.diagnostics) {
      lines.push(`- ${diagnostic}`);
    }
  }

  return lines.join('\n');
}

function hintFor(error: unknown): string | undefined {
  if (error instanceof BudgetInfeasibleError) return 'Raise --max-tokens or drop --fail-on-empty';
  if (error instanceof ConfigurationError) return 'Check the snapshot document and flag values';
  return undefined;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.problems.length > 0) {
    outputError(args.problems.join('; '), 'Run context-select --help for accepted values');
    process.exit(1);
  }

  if (!args.snapshot) {
    outputError('Snapshot file is required', 'Use --snapshot <file>, or --snapshot - to read stdin');
    process.exit(1);
  }

  let document: unknown;
  try {
    const text = args.snapshot === '-' ? await readStdin() : await readFile(args.snapshot, 'utf-8');
    document = JSON.parse(text);
  } catch (error) {
    outputError(`Could not read snapshot: ${describeError(error)}`, 'Check the path points to a snapshot JSON document');
    process.exit(1);
  }

  try {
    const run = runSelection(args, document);
    if (args.output === 'markdown') {
      console.log(formatSelectionMarkdown(run));
    } else {
      outputJSON(toCLIOutput(run));
    }
  } catch (error) {
    outputError(describeError(error), hintFor(error));
    process.exit(1);
  }
}

// Only run main() when executed directly, not when imported
const isDirectExecution = process.argv[1]?.endsWith('/cli.js') || process.argv[1]?.endsWith('/cli.ts');
if (isDirectExecution) {
  main().catch((error) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
  });
}
