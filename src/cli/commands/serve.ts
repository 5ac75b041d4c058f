/**
 * Serve Command
 *
 * Starts the lookup server over a corpus file.
 *
 * @module cli/commands/serve
 */

import type { Command } from 'commander';
import type { Server } from 'node:http';
import { createBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { UsageError, parseIntegerOption } from '../options.js';
import { loadConfig } from '../../config/index.js';
import { CorpusIndex, loadCorpus } from '../../lookup/corpus.js';
import { createApp, startServer } from '../../lookup/server.js';
import type { VideoRecord } from '../../schemas/video-record.js';

export interface ServeCommandOptions {
  data?: string;
  port?: string;
}

/**
 * Serve `records` and print where.
 */
export async function serveRecords(
  base: BaseCommand,
  records: readonly VideoRecord[],
  port: number,
  apiToken: string | undefined
): Promise<Server> {
  const index = new CorpusIndex(records);
  const server = await startServer(createApp(index, { apiToken, logger: base.toLogger() }), port);
  const address = server.address();
  const bound = address !== null && typeof address === 'object' ? address.port : port;

  base.success(`Lookup server listening on http://localhost:${bound}`);
  base.keyValue('Records', index.size);
  base.keyValue('Auth', apiToken ? 'bearer token required' : 'open');
  base.info('  GET /api/health');
  base.info('  GET /api/search?q=<text>');
  base.info('  GET /api/fetch/<id>');
  return server;
}

async function serveHandler(options: ServeCommandOptions, cmd: Command): Promise<void> {
  const base = createBaseCommand(cmd);

  try {
    const config = loadConfig();
    const port = options.port ? parseIntegerOption('port', options.port, 0) : config.server.port;
    const dataPath = options.data ?? config.dataPath;

    const { records, created } = await loadCorpus(dataPath);
    if (created) {
      base.warn(`No corpus at ${dataPath}; wrote a ${records.length}-row placeholder`);
    }
    base.debug(`Loaded ${records.length} records from ${dataPath}`);

    await serveRecords(base, records, port, config.server.apiToken);
  } catch (error) {
    if (error instanceof UsageError) {
      base.error(error.message, EXIT_CODES.USAGE_ERROR);
    }
    base.error(error instanceof Error ? error.message : String(error), error);
  }
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Serve a results table over HTTP for search and fetch')
    .option('-d, --data <path>', 'Table to serve (.csv or .json); defaults to DATA_PATH')
    .option('-p, --port <n>', 'Port to listen on; defaults to PORT or 8000')
    .action(serveHandler);
}
