import axios from 'axios';
import Bottleneck from 'bottleneck';
import type { AxiosInstance } from 'axios';
import type { UnifiedCardRecord } from '../../types/cards.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createLogger } from '../logger/index.js';

const log = createLogger('image-resolver');

export interface ImageLookupOptions {
  /** URL with a {cardId} placeholder. */
  urlTemplate: string;
  timeoutMs: number;
  client?: AxiosInstance;
  signal?: AbortSignal;
}

export interface ImageBatchOptions extends ImageLookupOptions {
  /** Lookups in flight at once. */
  concurrency?: number;
  /** Overall budget; lookups still running when it expires are abandoned. */
  deadlineMs?: number;
}

const DEFAULT_CONCURRENCY = 4;

export function buildImageUrl(urlTemplate: string, cardId: string): string {
  return urlTemplate.split('{cardId}').join(encodeURIComponent(cardId));
}

/**
 * Check that the image for a catalog card id is reachable. Any failure (timeout,
 * non-2xx, network) yields null; the caller simply renders no preview.
 */
export async function resolveCardImage(cardId: string, options: ImageLookupOptions): Promise<string | null> {
  const url = buildImageUrl(options.urlTemplate, cardId);
  const client = options.client ?? axios;

  try {
    const response = await client.head(url, {
      timeout: options.timeoutMs,
      signal: options.signal,
      validateStatus: () => true,
    });
    if (response.status >= 200 && response.status < 300) {
      return url;
    }
    log.debug({ cardId, status: response.status }, 'Image not available');
    return null;
  } catch (error) {
    if (options.signal?.aborted) {
      log.debug({ cardId }, 'Image lookup cancelled');
    } else {
      log.warn({ cardId, error: getErrorMessage(error) }, 'Image lookup failed');
    }
    return null;
  }
}

/**
 * cardId → image URL for every distinct card id. Lookups run through a bounded
 * limiter; aborting the signal or passing the deadline returns what has resolved
 * so far. Cards whose lookup fails or never finished are absent from the result.
 */
export async function resolveCardImages(
  cards: Iterable<Pick<UnifiedCardRecord, 'cardId'>>,
  options: ImageBatchOptions,
): Promise<Map<string, string>> {
  const ids = new Set<string>();
  for (const card of cards) {
    if (card.cardId) ids.add(card.cardId);
  }

  const controller = new AbortController();
  const stopped = new Promise<void>((resolve) => {
    controller.signal.addEventListener('abort', () => resolve(), { once: true });
  });
  const abort = (): void => controller.abort();
  options.signal?.addEventListener('abort', abort, { once: true });
  if (options.signal?.aborted) abort();
  const deadline = options.deadlineMs === undefined ? undefined : setTimeout(abort, options.deadlineMs);

  const limiter = new Bottleneck({ maxConcurrent: options.concurrency ?? DEFAULT_CONCURRENCY });
  const images = new Map<string, string>();
  const lookups = [...ids].map((cardId) =>
    limiter.schedule(async () => {
      if (controller.signal.aborted) return;
      const url = await resolveCardImage(cardId, { ...options, signal: controller.signal });
      if (url && !controller.signal.aborted) images.set(cardId, url);
    }),
  );

  try {
    await Promise.race([Promise.all(lookups), stopped]);
  } finally {
    clearTimeout(deadline);
    options.signal?.removeEventListener('abort', abort);
  }

  const cancelled = controller.signal.aborted;
  controller.abort();
  const level = cancelled ? 'warn' : 'info';
  log[level]({ requested: ids.size, resolved: images.size, cancelled }, 'Image lookup finished');
  return new Map(images);
}
