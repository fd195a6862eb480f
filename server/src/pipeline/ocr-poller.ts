import type { OcrBlock } from '../layout/types.js';
import type { OcrPollSettings } from '../lib/config.js';
import logger, { type Logger } from '../lib/logger.js';
import { sleep as defaultSleep, withRetry } from '../lib/retry.js';
import type { OcrClient, OcrResultPage } from '../services/ocr.js';
import { OcrJobFailedError, OcrTimeoutError } from './errors.js';

const TRANSIENT_RETRY_BASE_DELAY_MS = 2000;

export interface OcrPollOptions {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  log?: Logger;
}

/**
 * Polls an OCR job until it is terminal, then follows `nextToken` through every
 * result page. Each request gets its own bounded transient retries; the whole
 * wait is capped by `maxWaitSeconds` of wall-clock time, retry backoff and
 * result paging included. A failure on any result page fails the collection
 * rather than returning a partial document.
 */
export async function collectOcrBlocks(
  ocr: OcrClient,
  jobId: string,
  settings: OcrPollSettings,
  options: OcrPollOptions = {},
): Promise<OcrBlock[]> {
  const wait = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const log = options.log ?? logger;
  const deadline = now() + settings.maxWaitSeconds * 1000;

  const timeLeft = (): number => {
    const remaining = deadline - now();
    if (remaining <= 0) throw new OcrTimeoutError(jobId, settings.maxWaitSeconds);
    return remaining;
  };
  const waitWithinDeadline = async (ms: number): Promise<void> => {
    await wait(Math.min(ms, timeLeft()));
  };

  const request = (nextToken?: string): Promise<OcrResultPage> =>
    withRetry(() => ocr.poll(jobId, nextToken), {
      maxAttempts: settings.maxTransientRetries,
      baseDelay: TRANSIENT_RETRY_BASE_DELAY_MS,
      sleep: waitWithinDeadline,
      onRetry: (attempt, error) => {
        log.warn({ jobId, attempt, error: error.message }, 'Transient error polling OCR job');
      },
    });

  let page = await request();
  while (page.status === 'IN_PROGRESS') {
    await waitWithinDeadline(settings.pollIntervalSeconds * 1000);
    page = await request();
  }

  if (page.status === 'FAILED') {
    throw new OcrJobFailedError(jobId, page.statusMessage);
  }

  const blocks = [...page.blocks];
  let pages = 1;
  while (page.nextToken) {
    timeLeft();
    page = await request(page.nextToken);
    blocks.push(...page.blocks);
    pages += 1;
  }

  log.info({ jobId, pages, blocks: blocks.length }, 'Collected OCR result');
  return blocks;
}
