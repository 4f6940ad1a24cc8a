#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type LineEnding = '\n' | '\r\n';

/** Parsed command line, or an early exit (help/version). */
type Invocation =
  | { kind: 'exit'; code: number }
  | {
      kind: 'compile';
      entryFile: string;
      outputPath?: string;
      emitMap: boolean;
      print: boolean;
      lineEnding: LineEnding;
    };

type CompileInvocation = Extract<Invocation, { kind: 'compile' }>;

const USAGE = [
  'dblc [options] <entry.dbl>',
  '',
  'Options:',
  '  -o, --output <file>   Assembly output path (must end with .s)',
  '  -m, --map             Also write <base>.map',
  '  -p, --print           Print assembly to stdout instead of writing files',
  '      --crlf            Use CRLF line endings',
  '  -V, --version         Print version',
  '  -h, --help            Show help',
  '',
  'Artifacts go next to the entry file unless --output is given.',
  'The entry file must be the last argument.',
  '',
].join('\n');

const ENTRY_ARGUMENT = 'Expected exactly one <entry.dbl> argument (and it must be last)';

class CliError extends Error {
  override name = 'CliError';
}

function fail(message: string): never {
  throw new CliError(message);
}

async function packageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url));
  // One level up from src/, two from dist/src/.
  const candidates = [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    let raw: string;
    try {
      raw = await readFile(candidate, 'utf8');
    } catch {
      continue;
    }
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    }
  }
  return '0.0.0';
}

async function parseArgs(argv: string[]): Promise<Invocation> {
  let outputPath: string | undefined;
  let emitMap = false;
  let print = false;
  let lineEnding: LineEnding = '\n';
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg.startsWith('--output=')) {
      outputPath = arg.slice('--output='.length);
      if (!outputPath) fail('--output expects a value');
      continue;
    }
    switch (arg) {
      case '-h':
      case '--help':
        process.stdout.write(USAGE);
        return { kind: 'exit', code: 0 };
      case '-V':
      case '--version':
        process.stdout.write(`${await packageVersion()}\n`);
        return { kind: 'exit', code: 0 };
      case '-o':
      case '--output':
        outputPath = argv[++i];
        if (!outputPath) fail('--output expects a value');
        continue;
      case '-m':
      case '--map':
        emitMap = true;
        continue;
      case '-p':
      case '--print':
        print = true;
        continue;
      case '--crlf':
        lineEnding = '\r\n';
        continue;
    }
    if (arg.startsWith('-')) fail(`Unknown option "${arg}"`);
    if (i !== argv.length - 1) fail(ENTRY_ARGUMENT);
    entryFile = arg;
  }

  if (entryFile === undefined) fail(ENTRY_ARGUMENT);
  if (outputPath !== undefined && extname(outputPath).toLowerCase() !== '.s') {
    fail('--output must end with ".s"');
  }
  if (print && (outputPath !== undefined || emitMap)) {
    fail('--print cannot be combined with --output or --map');
  }

  return {
    kind: 'compile',
    entryFile,
    ...(outputPath !== undefined ? { outputPath } : {}),
    emitMap,
    print,
    lineEnding,
  };
}

/**
 * Output path without extension: `--output` when given, otherwise the entry file.
 */
function artifactBase(inv: CompileInvocation): string {
  const target = resolve(inv.outputPath ?? inv.entryFile);
  return join(dirname(target), basename(target, extname(target)));
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<string> {
  const pathFor = (a: Artifact): string => `${base}.${a.kind === 'asm' ? 's' : 'map'}`;
  await mkdir(dirname(base), { recursive: true });
  await Promise.all(artifacts.map((a) => writeFile(pathFor(a), a.text, 'utf8')));
  return `${base}.s`;
}

function formatDiagnostic(d: Diagnostic): string {
  const where =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${where}: ${d.severity}: [${d.id}] ${d.message}\n`;
}

async function compileAndWrite(inv: CompileInvocation): Promise<number> {
  const res = await compile(
    inv.entryFile,
    { emitAsm: true, emitMap: inv.emitMap, lineEnding: inv.lineEnding },
    { formats: defaultFormatWriters },
  );
  for (const d of res.diagnostics) process.stderr.write(formatDiagnostic(d));
  if (hasErrors(res.diagnostics)) return 1;

  if (inv.print) {
    for (const a of res.artifacts) {
      if (a.kind === 'asm') process.stdout.write(a.text);
    }
    return 0;
  }

  const asmPath = await writeArtifacts(artifactBase(inv), res.artifacts);
  process.stdout.write(`${asmPath}\n`);
  return 0;
}

/**
 * Run the compiler CLI. Resolves to the process exit code: 0 on success, 1 when compilation
 * reports an error or artifacts cannot be written, 2 for a bad command line.
 */
export async function runCli(argv: string[]): Promise<number> {
  let inv: Invocation;
  try {
    inv = await parseArgs(argv);
  } catch (err) {
    if (!(err instanceof CliError)) throw err;
    process.stderr.write(`dblc: ${err.message}\n${USAGE}\n`);
    return 2;
  }
  if (inv.kind === 'exit') return inv.code;

  try {
    return await compileAndWrite(inv);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`dblc: ${msg}\n`);
    return 1;
  }
}

function canonicalPath(path: string): string {
  const absolute = resolve(path);
  let real: string;
  try {
    real = realpathSync.native(absolute);
  } catch {
    real = absolute;
  }
  const slashed = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? slashed.toLowerCase() : slashed;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return canonicalPath(invokedAs) === canonicalPath(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
