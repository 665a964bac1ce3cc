import fs from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import {
  Classifier,
  EmptyInputError,
  LangForestError,
  MalformedModelError,
  createLogger,
  leafCount,
  loadDefaultModel,
  loadModelFile,
  tokens as tokenSequence,
  treeDepth,
  type Logger,
  type Model,
  type Ranking,
} from '@langforest/forest-core';

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  readStdin(): string;
  cwd: string;
}

interface GlobalOptions {
  model?: string;
}

interface ClassifyOptions {
  scores: boolean;
  top: number;
  json: boolean;
}

const EXIT_OK = 0;
const EXIT_USAGE = 1;
const EXIT_UNCLASSIFIED = 2;

class UsageError extends Error {}

function usage(io: CliIO): number {
  io.stdout(`Usage:
  langforest [--model <file>] classify [paths...] [options]
  langforest tokens [text...]
  langforest [--model <file>] labels
  langforest [--model <file>] inspect

Global options (before the command):
  --model <file>          Use this model file instead of the bundled one

Classify options (stdin is read when no paths are given):
  --scores                Print the vote totals of the top languages
  --top <n>               Number of languages shown with --scores (default: 3)
  --json                  One JSON object per input

Directories are searched recursively; node_modules and .git are skipped.`);
  return EXIT_USAGE;
}

function parseGlobalArgs(args: string[]): { rest: string[]; options: GlobalOptions } {
  const options: GlobalOptions = {};
  let i = 0;

  // global options come before the command word; everything after it belongs to the command
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--model') {
      const file = args[++i];
      if (!file) throw new UsageError('--model needs a file');
      options.model = file;
    } else if (arg.startsWith('--model=')) {
      options.model = arg.slice('--model='.length);
    } else {
      break;
    }
  }

  return { rest: args.slice(i), options };
}

export function parseClassifyArgs(args: string[]): { paths: string[]; options: ClassifyOptions } {
  const options: ClassifyOptions = { scores: false, top: 3, json: false };
  const paths: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      switch (arg) {
        case '--scores':
          options.scores = true;
          break;
        case '--top': {
          const top = parseInt(args[++i] || '', 10);
          if (!Number.isInteger(top) || top < 1) throw new UsageError('--top needs a positive integer');
          options.top = top;
          break;
        }
        case '--json':
          options.json = true;
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      paths.push(arg);
    }
    i++;
  }

  return { paths, options };
}

/**
 * Expand directories into the files beneath them
 * @returns Paths in argument order, directory contents sorted
 */
export function expandPaths(inputs: string[], cwd: string): string[] {
  const files: string[] = [];
  for (const input of inputs) {
    const resolved = path.resolve(cwd, input);
    if (fs.statSync(resolved).isDirectory()) {
      const found = glob.sync('**/*', {
        cwd: resolved,
        nodir: true,
        ignore: ['**/node_modules/**', '**/.git/**'],
      });
      for (const f of found.sort()) files.push(path.join(input, f));
    } else {
      files.push(input);
    }
  }
  return files;
}

function formatTotal(total: number): string {
  return String(Number(total.toFixed(3)));
}

export function formatRanking(ranking: Ranking, options: ClassifyOptions, file?: string): string {
  const top = ranking.ranked.slice(0, options.top);

  if (options.json) {
    return JSON.stringify({
      ...(file !== undefined ? { path: file } : {}),
      language: ranking.language,
      tokens: ranking.tokenCount,
      recognized: ranking.recognized,
      ...(options.scores ? { scores: top } : {}),
    });
  }

  const fields = file !== undefined ? [file, ranking.language] : [ranking.language];
  if (options.scores) {
    fields.push(top.map((entry) => `${entry.language}=${formatTotal(entry.total)}`).join(' '));
  }
  return fields.join('\t');
}

async function openModel(options: GlobalOptions, cwd: string): Promise<Model> {
  return options.model ? loadModelFile(path.resolve(cwd, options.model)) : loadDefaultModel();
}

function classifyOne(
  classifier: Classifier,
  text: string,
  options: ClassifyOptions,
  file: string | undefined,
  io: CliIO,
  log: Logger
): boolean {
  try {
    io.stdout(formatRanking(classifier.rank(text), options, file));
    return true;
  } catch (err) {
    if (err instanceof EmptyInputError) {
      log.warn('nothing to classify', { input: file ?? '<stdin>' });
      return false;
    }
    throw err;
  }
}

async function classifyCommand(args: string[], global: GlobalOptions, io: CliIO, log: Logger): Promise<number> {
  const { paths, options } = parseClassifyArgs(args);
  const classifier = new Classifier(await openModel(global, io.cwd));

  if (paths.length === 0) {
    return classifyOne(classifier, io.readStdin(), options, undefined, io, log) ? EXIT_OK : EXIT_UNCLASSIFIED;
  }

  let failures = 0;
  let files: string[];
  try {
    files = expandPaths(paths, io.cwd);
  } catch (err) {
    log.error('cannot read input', { error: err instanceof Error ? err : String(err) });
    return EXIT_USAGE;
  }

  for (const file of files) {
    let text: string;
    try {
      text = fs.readFileSync(path.resolve(io.cwd, file), 'utf8');
    } catch (err) {
      log.error('cannot read file', { input: file, error: err instanceof Error ? err : String(err) });
      failures++;
      continue;
    }
    if (!classifyOne(classifier, text, options, file, io, log)) failures++;
  }

  log.debug('classified', { files: files.length, failures });
  return failures > 0 ? EXIT_UNCLASSIFIED : EXIT_OK;
}

function tokensCommand(args: string[], io: CliIO): number {
  const json = args.includes('--json');
  const words = args.filter((arg) => arg !== '--json');
  const text = words.length > 0 ? words.join(' ') : io.readStdin();
  const sequence = tokenSequence(text);

  if (json) {
    io.stdout(JSON.stringify(sequence));
  } else {
    for (const token of sequence) io.stdout(token);
  }
  return EXIT_OK;
}

async function labelsCommand(global: GlobalOptions, io: CliIO): Promise<number> {
  const model = await openModel(global, io.cwd);
  for (const [id, symbol] of model.labels.entries()) io.stdout(`${id}\t${symbol}`);
  return EXIT_OK;
}

async function inspectCommand(args: string[], global: GlobalOptions, io: CliIO): Promise<number> {
  const model = await openModel(global, io.cwd);
  const stats = {
    version: model.version ?? 'unversioned',
    vocabulary: model.vocabulary.size,
    trees: model.forest.length,
    maxDepth: Math.max(...model.forest.map(treeDepth)),
    leaves: model.forest.reduce((sum, tree) => sum + leafCount(tree), 0),
    labels: model.labels.symbols.length,
  };

  if (args.includes('--json')) {
    io.stdout(JSON.stringify(stats));
  } else {
    for (const [key, value] of Object.entries(stats)) io.stdout(`${key}\t${value}`);
  }
  return EXIT_OK;
}

/**
 * Run one CLI invocation
 * @param argv - Arguments after the executable
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const log = createLogger('cli', { write: io.stderr });

  try {
    const { rest, options } = parseGlobalArgs(argv);
    const [cmd, ...args] = rest;
    switch (cmd) {
      case 'classify':
        return await classifyCommand(args, options, io, log);
      case 'tokens':
        return tokensCommand(args, io);
      case 'labels':
        return await labelsCommand(options, io);
      case 'inspect':
        return await inspectCommand(args, options, io);
      default:
        return usage(io);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      log.error(err.message);
      return EXIT_USAGE;
    }
    if (err instanceof MalformedModelError) {
      log.error(err.message, { issues: err.issues.length });
      return EXIT_USAGE;
    }
    if (err instanceof LangForestError) {
      log.error(err.message, { code: err.code });
      return EXIT_USAGE;
    }
    throw err;
  }
}

export function processIO(): CliIO {
  return {
    stdout: (line) => process.stdout.write(line + '\n'),
    stderr: (line) => process.stderr.write(line + '\n'),
    readStdin: () => fs.readFileSync(0, 'utf8'),
    cwd: process.cwd(),
  };
}
