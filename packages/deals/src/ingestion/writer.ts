import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { createLogger } from '../logger';
import type { DealPage } from './paginator';

const logger = createLogger('writer');

/** Streams every deal from `pages` to `outputPath`, one JSON document per line. */
export async function writeDealsNdjson(outputPath: string, pages: AsyncIterable<DealPage>): Promise<number> {
  let totalWritten = 0;

  async function* lines(): AsyncGenerator<string> {
    for await (const page of pages) {
      for (const deal of page.deals) {
        yield JSON.stringify(deal) + '\n';
      }
      totalWritten += page.deals.length;
      logger.debug({ totalWritten, cursor: page.cursor }, 'Page written');
    }
  }

  // Rejects when either side fails, an unopenable output file included
  await pipeline(Readable.from(lines()), createWriteStream(outputPath));

  logger.info({ outputPath, totalWritten }, 'Deals written');
  return totalWritten;
}
