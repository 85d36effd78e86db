#!/usr/bin/env node
import path from 'node:path';
import { getEnv, toConnectionSettings } from './config/env.js';
import { loadEnvironments, resolveEnvironmentsFile } from './config/environments.js';
import { ConnectionFactory } from './core/connection-factory.js';
import { createLogger } from './core/logger.js';
import { readQueryFile } from './core/query-file.js';
import { formatEnvironmentList, formatFatalError, formatQueryFileSummary } from './modules/report/diagnostics.js';
import { parseCliArgs, USAGE } from './modules/run/cli-options.js';
import { RunService } from './modules/run/run.service.js';

export async function main(argv: readonly string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'help') {
    process.stdout.write(USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    process.stderr.write(`Error: ${parsed.message}\n\n${USAGE}`);
    return 1;
  }

  const { options } = parsed;
  const logger = createLogger('FANOUT', { verbose: options.verbose });
  let connections: ConnectionFactory | undefined;

  try {
    const env = getEnv();

    const environmentsFile = await resolveEnvironmentsFile(options.environmentsFile);
    logger.debug(`Loading environments from ${environmentsFile}`);
    const endpoints = await loadEnvironments(environmentsFile);
    process.stderr.write(formatEnvironmentList(endpoints, options.verbose));

    const queryFile = await readQueryFile(options.queryFile);
    logger.debug(`Read ${queryFile.path} (${queryFile.encoding})`);
    process.stderr.write(formatQueryFileSummary(queryFile, options.verbose));

    connections = new ConnectionFactory({
      settings: toConnectionSettings(env),
      logger: logger.child('DB')
    });

    const service = new RunService({
      connections,
      output: process.stdout,
      diagnostics: process.stderr,
      logger
    });

    await service.run({
      query: queryFile.content,
      queryLabel: path.basename(queryFile.path),
      endpoints,
      csvOutput: options.csvOutput,
      verbose: options.verbose,
      batch: options.batch,
      probeConcurrency: env.FANOUT_PROBE_CONCURRENCY
    });
    return 0;
  } catch (error) {
    process.stderr.write(formatFatalError(error, options.verbose));
    return 1;
  } finally {
    await connections?.closeAll();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(formatFatalError(error, true));
    process.exitCode = 1;
  }
);
