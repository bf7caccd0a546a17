/**
 * Exhaustive paginated read of a remote table.
 */

import type { RequestController } from "./controller.js";
import { ProtocolError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RemoteRecord, RemoteTable, SearchPage } from "./types.js";

/**
 * Read every record of the table, page after page, until the remote stops
 * returning a page token.
 *
 * @throws ProtocolError when the remote hands out a page token it already gave,
 *   which would otherwise loop forever
 */
export async function fetchAllRecords(
  table: RemoteTable,
  controller: RequestController,
  logger: Logger = silentLogger
): Promise<RemoteRecord[]> {
  const records: RemoteRecord[] = [];
  const seenTokens = new Set<string>();
  let pageToken: string | null = null;
  let pageNumber = 0;

  logger.info("Reading remote records", { table: table.name });

  do {
    const token: string | null = pageToken;
    const page: SearchPage = await controller.execute(`search ${table.name} page ${pageNumber + 1}`, () =>
      table.search(token)
    );
    records.push(...page.records);
    pageNumber++;

    const next: string | null = page.nextPageToken;
    if (pageNumber === 1 || pageNumber % 5 === 0 || next === null) {
      logger.info("Remote records read", {
        table: table.name,
        records: records.length,
        pages: pageNumber,
      });
    }

    if (next !== null) {
      if (seenTokens.has(next)) {
        throw new ProtocolError(
          `Page token repeated after page ${pageNumber} of ${table.name}; refusing to loop`
        );
      }
      seenTokens.add(next);
    }
    pageToken = next;
  } while (pageToken !== null);

  return records;
}
