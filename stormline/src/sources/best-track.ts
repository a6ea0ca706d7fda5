import { fetchTextWithRetry, type RetryOptions } from '../core/fetcher.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import { BEST_TRACK_ATLANTIC, type SourceDefinition } from '../registry/sources.js';

export async function fetchBestTrack(
  source: SourceDefinition = BEST_TRACK_ATLANTIC,
  retry: Partial<RetryOptions> = {},
  logger: Logger = defaultLogger
): Promise<string> {
  logger.log(`Fetching ${source.name} from ${source.url}...`);
  const data = await fetchTextWithRetry(source.url, retry, logger);
  logger.log(`Fetched ${data.length} bytes`);
  return data;
}
