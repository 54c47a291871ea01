import 'dotenv/config';
import pino from 'pino';
import { ConnectionDiagnostics, createDealsClient } from './api';
import { loadConfig } from './config';
import { paginateDeals } from './ingestion/paginator';
import { writeDealsNdjson } from './ingestion/writer';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info', transport: { target: 'pino-pretty' } });

async function main() {
  const config = loadConfig();
  const client = createDealsClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    testDelayMs: config.testDelayMs,
  });

  logger.info({ baseUrl: config.baseUrl }, 'Deals extraction starting');

  const report = await new ConnectionDiagnostics(client).testConnection(config.accessToken);
  logger.info({ report }, 'Connection test finished');

  if (!report.tokenValid) {
    logger.error('Access token rejected by the API');
    process.exit(1);
  }
  if (!report.dataAccessible) {
    logger.warn('Data access probe failed, attempting extraction anyway');
  }

  const count = await writeDealsNdjson(
    config.outputFile,
    paginateDeals({
      client,
      accessToken: config.accessToken,
      pageSize: config.pageSize,
      properties: config.properties,
      associations: config.associations,
      maxPages: config.maxPages,
    })
  );

  logger.info({ count, outputFile: config.outputFile }, 'Extraction complete');
}

main().catch(err => {
  logger.error(err, 'Fatal error');
  process.exit(1);
});
