#!/usr/bin/env node
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import type { ProgramModel } from './frontend/ast.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import type { EofPolicy } from './pipeline.js';
import { run } from './run.js';
import type { TapeIo } from './runtime/io.js';
import { createStdio } from './runtime/io.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  mode: 'compile' | 'run';
  tapeLength?: number;
  eof: EofPolicy;
  boundsChecks: boolean;
  emitListing: boolean;
  annotate: boolean;
  debug: boolean;
};

function usage(): string {
  return [
    'tapecc [options] <program.b>',
    '',
    'Options:',
    '  -o, --output <file>      Primary output path (must end with .ll)',
    '  -r, --run                Interpret the program instead of compiling it',
    '  -t, --tape-length <n>    Number of tape cells (default: 30000)',
    '      --eof <policy>       Read at end of input: zero|unchanged|error (default: zero)',
    '      --no-bounds-check    Omit tape-pointer bounds checks from generated IR',
    '  -n, --nolist             Suppress .lst',
    '      --annotate           Keep per-instruction source comments in .ll',
    '  -d, --debug              Print stage summaries on stderr',
    '  -V, --version            Print version',
    '  -h, --help               Show help',
    '',
    'Notes:',
    '  - <program.b> must be the last argument.',
    '  - Artifacts are written next to the primary output using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts under test, dist/src/cli.js when built.
  const candidates = [
    resolve(here, '..', 'package.json'),
    resolve(here, '..', '..', 'package.json'),
  ];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg !== 'object' || pkg === null) continue;
    if ('name' in pkg && pkg.name === 'tapecc' && 'version' in pkg) return String(pkg.version);
  }
  return '0.0.0';
}

function optionValue(argv: string[], i: number, flag: string, long: string): [string, number] {
  const a = argv[i] ?? '';
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return [v, i];
  }
  const v = argv[i + 1];
  if (!v) fail(`${flag} expects a value`);
  return [v, i + 1];
}

function isOption(a: string, short: string | undefined, long: string): boolean {
  return a === short || a === long || a.startsWith(`${long}=`);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let mode: CliOptions['mode'] = 'compile';
  let tapeLength: number | undefined;
  let eof: EofPolicy = 'zero';
  let boundsChecks = true;
  let emitListing = true;
  let annotate = false;
  let debug = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (isOption(a, '-o', '--output')) {
      [outputPath, i] = optionValue(argv, i, a, '--output');
      continue;
    }
    if (isOption(a, '-t', '--tape-length')) {
      let v: string;
      [v, i] = optionValue(argv, i, a, '--tape-length');
      if (!/^[0-9]+$/.test(v) || Number(v) < 1) {
        fail(`--tape-length expects a positive integer (got "${v}")`);
      }
      tapeLength = Number(v);
      continue;
    }
    if (isOption(a, undefined, '--eof')) {
      let v: string;
      [v, i] = optionValue(argv, i, a, '--eof');
      if (v !== 'zero' && v !== 'unchanged' && v !== 'error') {
        fail(`Unsupported --eof "${v}" (expected zero|unchanged|error)`);
      }
      eof = v;
      continue;
    }
    if (a === '-r' || a === '--run') {
      mode = 'run';
      continue;
    }
    if (a === '--no-bounds-check') {
      boundsChecks = false;
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--annotate') {
      annotate = true;
      continue;
    }
    if (a === '-d' || a === '--debug') {
      debug = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <program.b> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <program.b> argument (and it must be last)`);
  }

  if (outputPath !== undefined) {
    if (mode === 'run') fail(`--output cannot be combined with --run`);
    if (extname(outputPath).toLowerCase() !== '.ll') {
      fail(`--output must end with ".ll"`);
    }
  }

  return {
    entryFile,
    ...(outputPath !== undefined ? { outputPath } : {}),
    mode,
    ...(tapeLength !== undefined ? { tapeLength } : {}),
    eof,
    boundsChecks,
    emitListing,
    annotate,
    debug,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const target = resolve(outputPath ?? entryFile);
  const ext = extname(target);
  return ext.length > 0 ? target.slice(0, -ext.length) : target;
}

async function writeArtifacts(base: string, artifacts: Artifact[], debug: boolean): Promise<void> {
  const llPath = `${base}.ll`;
  const lstPath = `${base}.lst`;
  await mkdir(dirname(llPath), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    const path = artifact.kind === 'll' ? llPath : lstPath;
    writes.push(writeFile(path, artifact.text, 'utf8'));
    if (debug) process.stderr.write(`tapecc: wrote ${artifact.kind}: ${path}\n`);
  }
  await Promise.all(writes);

  process.stdout.write(`${llPath}\n`);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Render a diagnostic as `<file>:<line>:<column>: <severity>: [<id>] <message>`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

function debugParse(program: ProgramModel | undefined): void {
  if (!program) return;
  process.stderr.write(
    `tapecc: parse: ${program.tokens.length} instructions, ${program.pairing.pairs.length} loops\n`,
  );
}

function reportDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of [...diagnostics].sort(compareDiagnosticsForCli)) {
    process.stderr.write(`${formatDiagnostic(d)}\n`);
  }
}

/**
 * CLI entry. Returns the exit code: 0 success, 1 program diagnostics with errors, 2 usage error.
 *
 * `io` is only used by `--run`; it defaults to blocking stdin/stdout.
 */
export async function runCli(argv: string[], io?: TapeIo): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const machine = {
      ...(parsed.tapeLength !== undefined ? { tapeLength: parsed.tapeLength } : {}),
      eof: parsed.eof,
      boundsChecks: parsed.boundsChecks,
    };

    if (parsed.mode === 'run') {
      const res = await run(parsed.entryFile, io ?? createStdio(), machine);
      if (parsed.debug) debugParse(res.program);
      if (parsed.debug && res.execution) {
        process.stderr.write(`tapecc: run: ${res.execution.steps} steps\n`);
      }
      reportDiagnostics(res.diagnostics);
      return hasErrors(res.diagnostics) ? 1 : 0;
    }

    const res = await compile(
      parsed.entryFile,
      { ...machine, emitListing: parsed.emitListing, annotate: parsed.annotate },
      { formats: defaultFormatWriters },
    );
    if (parsed.debug) debugParse(res.program);

    reportDiagnostics(res.diagnostics);
    if (hasErrors(res.diagnostics)) {
      return 1;
    }

    const base = artifactBase(parsed.entryFile, parsed.outputPath);
    await writeArtifacts(base, res.artifacts, parsed.debug);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`tapecc: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  try {
    return realpathSync(resolve(invokedAs)) === realpathSync(self);
  } catch {
    return false;
  }
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
