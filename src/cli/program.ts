import { readFile, writeFile } from 'node:fs/promises';

import { Command, Option } from 'commander';
import { z } from 'zod';

import { validateWithSchema } from '../validator';
import { type CliIo, type RunOptions, runClean } from './run';

export const VERSION = '0.1.0';

export type CliDeps = CliIo & {
  setExitCode(code: number): void;
};

export const nodeDeps: CliDeps = {
  readFile: file => readFile(file, 'utf8'),
  writeFile: (file, contents) => writeFile(file, contents, 'utf8'),
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
  setExitCode: code => {
    process.exitCode = code;
  }
};

const stringList = z.array(z.string()).default([]);

/**
 * Shape of commander's parsed options, mapped onto {@link RunOptions}.
 */
const cliOptionsSchema = z
  .object({
    config: z.string().optional(),
    pool: stringList,
    identifierField: z.string().optional(),
    ref: stringList,
    anchor: stringList,
    rootAnchor: z.boolean().default(true),
    skipMissing: z.boolean().default(false),
    mergeDuplicates: z.boolean().default(false),
    output: z.string().optional(),
    stdout: z.boolean().default(false),
    strict: z.boolean().default(false),
    explain: z.boolean().default(false),
    quiet: z.boolean().default(false),
    verbose: z.boolean().default(false)
  })
  .transform(
    (options): RunOptions => ({
      config: options.config,
      pools: options.pool,
      identifierField: options.identifierField,
      refs: options.ref,
      anchors: options.anchor,
      rootAnchor: options.rootAnchor,
      skipMissing: options.skipMissing,
      mergeDuplicates: options.mergeDuplicates,
      output: options.output,
      stdout: options.stdout,
      strict: options.strict,
      explain: options.explain,
      logLevel: options.quiet ? 'error' : options.verbose ? 'debug' : 'info'
    })
  );

/**
 * Builds the `orphan-sweep` command.
 *
 * Variadic options (`--pool`, `--ref`, `--anchor`) take every following
 * argument up to the next option, so the document path goes first:
 *
 * ```sh
 * orphan-sweep data.json --pool items --ref uses.name --anchor settings
 * ```
 *
 * The exit code is handed to `deps.setExitCode` instead of exiting, so
 * pending output is flushed.
 */
export function createProgram(deps: CliDeps = nodeDeps): Command {
  const program = new Command();

  program
    .name('orphan-sweep')
    .description(
      'Remove pool entries of a JSON document that are no longer reachable from its anchors'
    )
    .version(VERSION)
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr })
    .argument('<file>', 'JSON document to clean (comments and trailing commas allowed)')
    .option('-c, --config <file>', 'JSON configuration file (CleanConfig)')
    .option('-p, --pool <pattern...>', 'path pattern of a pool sequence ("*" matches any index)')
    .option('--identifier-field <key>', 'identifier field of the pools given by --pool')
    .option('-r, --ref <field...>', 'reference field: "field" (direct) or "field.subField" (nested)')
    .option('-a, --anchor <pattern...>', 'path pattern of a location that is always in use')
    .option('--no-root-anchor', 'do not treat the top-level location as an anchor')
    .option('--skip-missing', 'skip pool elements without an identifier instead of failing')
    .option('--merge-duplicates', 'merge pool elements sharing an identifier instead of failing')
    .addOption(
      new Option(
        '-o, --output <file>',
        'output file (default: cleaned_<file> beside the input)'
      ).conflicts('stdout')
    )
    .option('--stdout', 'write the cleaned document to stdout')
    .option('--strict', 'exit with code 2 when warnings were recorded')
    .option('--explain', 'print why each kept element is in use')
    .addOption(new Option('-q, --quiet', 'only print errors').conflicts('verbose'))
    .option('-v, --verbose', 'print debug output')
    .action(async (file: string, rawOptions: unknown) => {
      const options = validateWithSchema(cliOptionsSchema, rawOptions, 'command-line options');
      deps.setExitCode(await runClean(file, options, deps));
    });

  return program;
}
