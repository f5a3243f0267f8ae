/**
 * Catalog fetcher: lists every monster reference
 */

import type { ApiClient } from "../client";
import { API_CONSTANTS } from "../constants";
import { FetchError, ValidationError, toError } from "../errors";
import type { MonsterSummary } from "../types";
import { Logger } from "../utils/logger";
import { parseCatalogResponse } from "../validation";

/**
 * Fetches the monster catalog
 * @param client - Catalog API client
 * @param limit - Keep only the first N entries, in server order (default: all)
 * @returns Catalog entries in server order
 * @throws FetchError if the request fails or the payload is malformed
 */
export async function fetchSummaries(
  client: ApiClient,
  limit?: number,
): Promise<MonsterSummary[]> {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ValidationError("limit must be a non-negative integer", "limit");
  }

  const url = client.catalogUrl(API_CONSTANTS.MONSTERS_RESOURCE);
  Logger.info(`Fetching monsters from: ${url}`, { url });

  const payload = await client.getJson(url);

  let results: MonsterSummary[];
  try {
    ({ results } = parseCatalogResponse(payload));
  } catch (e) {
    const err = toError(e);
    throw new FetchError(
      `Malformed catalog response from ${url}: ${err.message}`,
      url,
      undefined,
      err,
    );
  }

  if (limit === undefined) {
    Logger.info(`Fetched all ${results.length} monsters from API`, {
      count: results.length,
    });
    return results;
  }

  const limited = results.slice(0, limit);
  Logger.info(
    `Limited to first ${limited.length} monsters from total ${results.length} available`,
    { count: limited.length, total: results.length },
  );
  return limited;
}
