/**
 * @file cli/cli.ts
 * @brief Command-line interface for checking and evaluating FHE programs
 *
 * Usage:
 *   fhe-ref list
 *   fhe-ref check --example scale_u8
 *   fhe-ref run --program add.json --input a=200 --input b=100
 *   fhe-ref vectors --example sum_array_u8 --inputs sets.json --out vectors.json
 *   fhe-ref verify --program add.json --vectors vectors.json
 *
 * Results go to stdout; logs go to stderr so `--format json` output stays
 * machine-readable.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { describeError, FHEProgramError, FHEProgramErrorCode, TypeMismatchError } from '../api/errors';
import { checkProgram, type CheckedProgram } from '../checker/capability-checker';
import { loadConfig, isOutputFormat, type OutputFormat } from '../config';
import { evaluate, type EvaluationInputs } from '../evaluator/reference-evaluator';
import { loadProgram, programFingerprint } from '../program/document';
import { createProgram, type Program } from '../program/program';
import { EXAMPLE_PROGRAMS, findExamples } from '../programs/catalogue';
import { createLogger, type Logger, type LogSink } from '../telemetry/logger';
import {
  generateTestVectors,
  parseTestVectors,
  serializeTestVectors,
  verifyTestVectors,
  type VectorVerificationReport,
} from '../test-vectors/test-vectors';
import { decodeValueMap, encodeValueMap, EncodedValueSchema } from '../values/codec';
import { array, formatValue, scalar } from '../values/construct';
import { formatValueType, type ScalarType, type Value, type ValueType } from '../values/types';

// ============================================================================
// CLI Implementation
// ============================================================================

export type Command = 'list' | 'check' | 'run' | 'vectors' | 'verify';

const COMMANDS: readonly Command[] = ['list', 'check', 'run', 'vectors', 'verify'];

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export interface CLIOptions {
  command: Command | undefined;
  program: string | undefined;
  example: string | undefined;
  inputs: string | undefined;
  input: string[];
  format: OutputFormat | undefined;
  out: string | undefined;
  vectors: string | undefined;
  verbose: boolean;
  help: boolean;
}

/** Where the CLI reads and writes; replaced in tests */
export interface CLIIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => string;
  writeFile: (path: string, content: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CLIIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
  writeFile: (path, content) => fs.writeFileSync(path, content),
  env: process.env,
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Bad command line; reported with a pointer to --help
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

function takeValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    command: undefined,
    program: undefined,
    example: undefined,
    inputs: undefined,
    input: [],
    format: undefined,
    out: undefined,
    vectors: undefined,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--program':
      case '-p':
        options.program = takeValue(args, i, arg);
        i++;
        break;
      case '--example':
      case '-e':
        options.example = takeValue(args, i, arg);
        i++;
        break;
      case '--inputs':
        options.inputs = takeValue(args, i, arg);
        i++;
        break;
      case '--input':
      case '-i':
        options.input.push(takeValue(args, i, arg));
        i++;
        break;
      case '--format':
      case '-f': {
        const format = takeValue(args, i, arg);
        if (!isOutputFormat(format)) {
          throw new UsageError(`Unknown format ${format} (expected text or json)`);
        }
        options.format = format;
        i++;
        break;
      }
      case '--out':
      case '-o':
        options.out = takeValue(args, i, arg);
        i++;
        break;
      case '--vectors':
        options.vectors = takeValue(args, i, arg);
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        if (options.command !== undefined) {
          throw new UsageError(`Unexpected argument ${arg}`);
        }
        if (!isCommand(arg)) {
          throw new UsageError(`Unknown command ${arg}`);
        }
        options.command = arg;
    }
  }

  return options;
}

export function helpText(): string {
  return `
FHE Program Reference Tool

Usage:
  fhe-ref <command> [options]

Commands:
  list                    List the example programs
  check                   Check a program's encryption capabilities
  run                     Evaluate a program on plaintext inputs
  vectors                 Generate a test-vector document
  verify                  Re-evaluate a test-vector document and report mismatches

Options:
  -p, --program <file>    Program document (JSON)
  -e, --example <name>    Example program from the catalogue
      --inputs <file>     Input values (JSON object; an array of objects for vectors)
  -i, --input <name=val>  Inline input, parsed against the parameter type (repeatable)
  -f, --format <format>   Output format: text, json (default: text)
  -o, --out <file>        Write the generated document to a file
      --vectors <file>    Test-vector document to verify
  -v, --verbose           Debug logging on stderr
  -h, --help              Show this help message

Environment:
  FHE_REF_LOG_LEVEL       debug, info, warn, error or silent (default: warn)
  FHE_REF_FORMAT          text or json (default: text)

Examples:
  fhe-ref run --example scale_u8 --input ct=3 --input scale=4
  fhe-ref run --example sum_array_u8 --input arr=100,100,100,100
  fhe-ref vectors --program add.json --inputs sets.json --out vectors.json
  fhe-ref verify --program add.json --vectors vectors.json
`;
}

function printHelp(io: CLIIO): void {
  io.stdout(helpText());
}

// ============================================================================
// Inputs
// ============================================================================

function parseRawScalar(text: string, type: ScalarType): bigint | boolean {
  if (type === 'bool') {
    if (text === 'true') return true;
    if (text === 'false') return false;
    throw new TypeMismatchError(`expected true or false, got ${JSON.stringify(text)}`);
  }
  if (!/^-?\d+$/.test(text)) {
    throw new TypeMismatchError(`expected a decimal integer for ${type}, got ${JSON.stringify(text)}`);
  }
  return BigInt(text);
}

/**
 * Parse an inline value against a declared type: `200`, `-5`, `true`, or a
 * comma-separated list for arrays (`1,2,3,4`)
 */
export function parseInlineValue(text: string, type: ValueType): Value {
  if (type.kind === 'array') {
    const parts = text.split(',').map((part) => part.trim());
    return array(
      type.scalar,
      parts.map((part) => parseRawScalar(part, type.scalar))
    );
  }
  return scalar(type.scalar, parseRawScalar(text.trim(), type.scalar));
}

function parseInlineInputs(program: Program, assignments: readonly string[]): Map<string, Value> {
  const inputs = new Map<string, Value>();
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      throw new UsageError(`Expected name=value, got ${assignment}`);
    }
    const name = assignment.slice(0, eq);
    const type = program.isParameter(name) ? program.typeOf(name) : undefined;
    if (type === undefined) {
      throw new TypeMismatchError(`Unexpected input ${name}: ${program.name} has no such parameter`, { name });
    }
    try {
      inputs.set(name, parseInlineValue(assignment.slice(eq + 1), type));
    } catch (error) {
      if (error instanceof TypeMismatchError) {
        throw new TypeMismatchError(`Input ${name} (${formatValueType(type)}): ${error.message}`, { name });
      }
      throw error;
    }
  }
  return inputs;
}

const InputSetSchema = z.record(EncodedValueSchema);
const InputFileSchema = z.union([InputSetSchema, z.array(InputSetSchema)]);

/**
 * Read an inputs file: one input set, or an array of them
 */
function readInputSets(io: CLIIO, path: string): Map<string, Value>[] {
  let raw: unknown;
  try {
    raw = JSON.parse(io.readFile(path));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new FHEProgramError(`${path} is not valid JSON: ${error.message}`, FHEProgramErrorCode.SERIALIZATION_ERROR);
    }
    throw error;
  }
  const parsed = InputFileSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new FHEProgramError(`Invalid inputs file ${path}: ${reason}`, FHEProgramErrorCode.SERIALIZATION_ERROR);
  }
  const sets = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return sets.map((set) => decodeValueMap(set));
}

interface ResolvedProgram {
  program: Program;
  sampleInputs: Readonly<Record<string, Value>> | undefined;
}

function resolveProgram(options: CLIOptions, io: CLIIO): ResolvedProgram {
  if (options.program !== undefined && options.example !== undefined) {
    throw new UsageError('Use either --program or --example, not both');
  }
  if (options.program !== undefined) {
    return { program: loadProgram(io.readFile(options.program)), sampleInputs: undefined };
  }
  if (options.example !== undefined) {
    const matches = findExamples(options.example);
    const [first] = matches;
    if (first === undefined) {
      throw new UsageError(`No example named ${options.example}; run fhe-ref list`);
    }
    if (matches.length > 1) {
      throw new UsageError(`${matches.length} examples are named ${options.example}; use --program instead`);
    }
    return { program: createProgram(first.definition), sampleInputs: first.sampleInputs };
  }
  throw new UsageError('No program given; use --program <file> or --example <name>');
}

function resolveInputSets(options: CLIOptions, io: CLIIO, resolved: ResolvedProgram): EvaluationInputs[] {
  if (options.inputs !== undefined) {
    const sets = readInputSets(io, options.inputs);
    if (options.input.length > 0) {
      const [first] = sets;
      if (sets.length !== 1 || first === undefined) {
        throw new UsageError('--input can only be combined with an inputs file holding one input set');
      }
      for (const [name, value] of parseInlineInputs(resolved.program, options.input)) {
        first.set(name, value);
      }
    }
    return sets;
  }
  if (options.input.length > 0) {
    return [parseInlineInputs(resolved.program, options.input)];
  }
  if (resolved.sampleInputs !== undefined) {
    return [resolved.sampleInputs];
  }
  throw new UsageError('No inputs given; use --inputs <file> or --input name=value');
}

function requireChecked(program: Program, logger: Logger): CheckedProgram {
  const result = checkProgram(program, { logger });
  if (!result.ok) {
    throw result.error;
  }
  return result.program;
}

// ============================================================================
// Commands
// ============================================================================

function runList(format: OutputFormat, io: CLIIO): number {
  if (format === 'json') {
    const entries = EXAMPLE_PROGRAMS.map((example) => ({
      name: example.definition.name,
      description: example.definition.description ?? '',
    }));
    io.stdout(JSON.stringify(entries, null, 2));
    return EXIT_OK;
  }
  const width = Math.max(...EXAMPLE_PROGRAMS.map((example) => example.definition.name.length));
  for (const example of EXAMPLE_PROGRAMS) {
    io.stdout(`${example.definition.name.padEnd(width)}  ${example.definition.description ?? ''}`);
  }
  return EXIT_OK;
}

function runCheck(options: CLIOptions, format: OutputFormat, io: CLIIO, logger: Logger): number {
  const { program } = resolveProgram(options, io);
  const result = checkProgram(program, { logger });

  if (format === 'json') {
    io.stdout(
      JSON.stringify(
        result.ok
          ? { program: program.name, ok: true, fingerprint: programFingerprint(program) }
          : { program: program.name, ok: false, code: result.error.code, message: result.error.message },
        null,
        2
      )
    );
  } else if (result.ok) {
    io.stdout(`✓ ${program.name}: capability check passed`);
  } else {
    io.stdout(`✗ ${program.name}: ${describeError(result.error)}`);
  }
  return result.ok ? EXIT_OK : EXIT_FAILURE;
}

function runEvaluate(options: CLIOptions, format: OutputFormat, io: CLIIO, logger: Logger): number {
  const resolved = resolveProgram(options, io);
  const checked = requireChecked(resolved.program, logger);
  const inputSets = resolveInputSets(options, io, resolved);

  const results: Record<string, unknown>[] = [];
  let failed = false;

  for (const [index, inputs] of inputSets.entries()) {
    const result = evaluate(checked, inputs, { logger });
    if (format === 'json') {
      results.push(
        result.ok
          ? { ok: true, outputs: encodeValueMap(result.outputs) }
          : { ok: false, code: result.error.code, message: result.error.message }
      );
    } else {
      if (inputSets.length > 1) io.stdout(`# input set ${index}`);
      if (result.ok) {
        for (const [name, value] of result.outputs) {
          io.stdout(`${name} = ${formatValue(value)}`);
        }
      } else {
        io.stdout(`✗ ${describeError(result.error)}`);
      }
    }
    if (!result.ok) failed = true;
  }

  if (format === 'json') {
    const [only] = results;
    io.stdout(JSON.stringify(results.length === 1 && only !== undefined ? only : results, null, 2));
  }
  return failed ? EXIT_FAILURE : EXIT_OK;
}

function runVectors(options: CLIOptions, io: CLIIO, logger: Logger): number {
  const resolved = resolveProgram(options, io);
  const checked = requireChecked(resolved.program, logger);
  const doc = generateTestVectors(checked, resolveInputSets(options, io, resolved));
  const text = serializeTestVectors(doc);

  if (options.out !== undefined) {
    io.writeFile(options.out, text);
    logger.info(`Wrote ${doc.cases.length} test vectors for ${doc.program} to ${options.out}`);
  } else {
    io.stdout(text);
  }
  return EXIT_OK;
}

function printVerification(report: VectorVerificationReport, programName: string, io: CLIIO): void {
  io.stdout(`${report.valid ? '✓' : '✗'} ${programName}: ${report.casesChecked} cases checked`);
  if (!report.fingerprintMatches) {
    io.stdout('    ERROR: test vectors were generated for a different program');
  }
  for (const mismatch of report.mismatches) {
    const expected = mismatch.expected ?? '(none)';
    const actual = mismatch.actual ?? '(none)';
    io.stdout(`    case ${mismatch.caseIndex}: ${mismatch.output} ${mismatch.kind}: expected ${expected}, got ${actual}`);
  }
  for (const error of report.errors) {
    io.stdout(`    case ${error.caseIndex}: ERROR: ${error.message}`);
  }
}

function runVerify(options: CLIOptions, format: OutputFormat, io: CLIIO, logger: Logger): number {
  if (options.vectors === undefined) {
    throw new UsageError('verify needs --vectors <file>');
  }
  const { program } = resolveProgram(options, io);
  const checked = requireChecked(program, logger);
  const doc = parseTestVectors(io.readFile(options.vectors));
  const report = verifyTestVectors(checked, doc);

  if (format === 'json') {
    io.stdout(JSON.stringify({ program: program.name, ...report }, null, 2));
  } else {
    printVerification(report, program.name, io);
  }
  return report.valid ? EXIT_OK : EXIT_FAILURE;
}

// ============================================================================
// Entry Point
// ============================================================================

function stderrSink(io: CLIIO): LogSink {
  return (_level, line, context) => {
    io.stderr(context !== undefined && Object.keys(context).length > 0 ? `${line} ${JSON.stringify(context)}` : line);
  };
}

/**
 * Run the CLI and return its exit code
 */
export async function main(args: readonly string[], io: CLIIO = defaultIO): Promise<number> {
  if (args.length === 0) {
    printHelp(io);
    return EXIT_USAGE;
  }

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}. Use --help for usage.`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    printHelp(io);
    return EXIT_OK;
  }

  const { config, warnings } = loadConfig(io.env);
  const logger = createLogger(options.verbose ? 'debug' : config.logLevel, stderrSink(io));
  for (const warning of warnings) {
    logger.warn(warning);
  }
  const format = options.format ?? config.outputFormat;

  try {
    switch (options.command) {
      case 'list':
        return runList(format, io);
      case 'check':
        return runCheck(options, format, io, logger);
      case 'run':
        return runEvaluate(options, format, io, logger);
      case 'vectors':
        return runVectors(options, io, logger);
      case 'verify':
        return runVerify(options, format, io, logger);
      case undefined:
        throw new UsageError('No command given');
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}. Use --help for usage.`);
      return EXIT_USAGE;
    }
    io.stderr(`Error: ${describeError(error)}`);
    if (options.verbose && error instanceof Error && error.stack !== undefined) {
      io.stderr(error.stack);
    }
    return EXIT_FAILURE;
  }
}
