import { loadEnv, type AppEnv } from '@partscout/config';
import { createLogger, type Logger } from '@partscout/logger';
import { toCsv } from '@partscout/search';

import { formatReport } from './report.js';
import { buildPipeline, type PipelineOverrides } from './runtime/pipeline.js';

export const USAGE = 'Usage: part-finder <part request, e.g. "brake pad for Honda City">';

export type CliIo = Readonly<{
  out: (line: string) => void;
  err: (line: string) => void;
  writeFile: (filePath: string, contents: string) => Promise<void>;
}>;

export type RunPartFinderOptions = Readonly<{
  argv: readonly string[];
  env: Record<string, string | undefined>;
  io: CliIo;
  logger?: Logger;
  overrides?: PipelineOverrides;
}>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one search for the words in `argv`, prints the report and writes the
 * CSV export. Resolves with the process exit code.
 */
export async function runPartFinder(options: RunPartFinderOptions): Promise<number> {
  const { io } = options;
  const rawQuery = options.argv.join(' ').trim();
  if (!rawQuery) {
    io.err(USAGE);
    return 1;
  }

  let env: AppEnv;
  try {
    env = loadEnv(options.env);
  } catch (error) {
    io.err(`Configuration error: ${errorMessage(error)}`);
    return 1;
  }

  const logger =
    options.logger ??
    createLogger({
      service: 'part-finder',
      env: env.nodeEnv,
      level: env.logLevel,
      destination: process.stderr,
    });

  const pipeline = buildPipeline(env, logger, options.overrides);
  try {
    const outcome = await pipeline.session.search(rawQuery);
    io.out(formatReport(outcome));

    await io.writeFile(env.exportPath, toCsv(outcome.listings));
    io.out(`Exported ${outcome.listings.length} listing(s) to ${env.exportPath}`);
    return 0;
  } catch (error) {
    logger.error({ error }, 'part search failed');
    io.err(`Search failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    await pipeline.close();
  }
}
