import path from 'node:path';

import { clean } from '../clean';
import { resolveConfig } from '../config-validator';
import { formatCleanSummary, formatDiagnostic, formatReachability } from '../report';
import { type ConfigFlags, mergeConfigFlags, parseJsonc } from './config-file';
import { type LogLevel, createLogger } from './logger';

/**
 * File and stream access of a run. Tests pass an in-memory implementation.
 */
export type CliIo = {
  readFile(file: string): Promise<string>;
  writeFile(file: string, contents: string): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
};

export type RunOptions = ConfigFlags & {
  readonly config: string | undefined;
  readonly output: string | undefined;
  readonly stdout: boolean;
  readonly strict: boolean;
  readonly explain: boolean;
  readonly logLevel: LogLevel;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_WARNINGS = 2;

/**
 * `cleaned_<name>` beside the input file.
 */
export function defaultOutputPath(file: string): string {
  return path.join(path.dirname(file), `cleaned_${path.basename(file)}`);
}

/**
 * Cleans one document.
 *
 * Logic:
 * 1. Read the configuration file (if any) and merge the flags into it.
 * 2. Resolve the configuration, so that configuration errors surface before
 *    the document is read.
 * 3. Read and parse the document, then clean it.
 * 4. Report warnings, and with `--explain` why each kept element survived.
 * 5. Write the pruned document (two-space indent) and the summary.
 *
 * @returns
 *   {@link EXIT_OK}, {@link EXIT_FAILURE} when the run was aborted (the error
 *   is logged), or {@link EXIT_WARNINGS} when `strict` is set and warnings
 *   were recorded. The output is written in that case too.
 */
export async function runClean(
  file: string,
  options: RunOptions,
  io: CliIo
): Promise<number> {
  const logger = createLogger(options.logLevel, io.stderr);

  try {
    // 1. Configuration input
    const fileConfig =
      options.config === undefined
        ? undefined
        : parseJsonc(await io.readFile(options.config), options.config);

    // 2. Resolution
    const config = resolveConfig(mergeConfigFlags(fileConfig, options));
    logger.debug(
      `Resolved ${config.pools.length} pool(s), ${config.referenceFields.length} reference field(s), ` +
        `${config.anchors.length} anchor(s).`
    );

    // 3. Cleaning
    const document = parseJsonc(await io.readFile(file), file);
    const result = clean(document, config);

    // 4. Diagnostics
    for (const diagnostic of result.diagnostics) {
      logger.warn(formatDiagnostic(diagnostic));
    }
    if (options.explain) {
      for (const line of formatReachability(result.reachability)) logger.info(line);
    }

    // 5. Output
    const serialized = `${JSON.stringify(result.tree, null, 2)}\n`;
    if (options.stdout) {
      io.stdout(serialized);
    } else {
      const target = options.output ?? defaultOutputPath(file);
      await io.writeFile(target, serialized);
      logger.info(`Wrote ${target}`);
    }
    logger.info(formatCleanSummary(result));

    return options.strict && result.diagnostics.length > 0 ? EXIT_WARNINGS : EXIT_OK;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return EXIT_FAILURE;
  }
}
