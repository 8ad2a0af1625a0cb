import { moduleLogger } from '../logger.js';
import { errorMessage } from './errors.js';

const log = moduleLogger('pool');

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

export interface MapWithConcurrencyOptions<T, R> {
  /** Called once per finished item, in completion order. */
  onSettled?: (result: Settled<R>, index: number, item: T) => void;
  /** Checked before each item is claimed; once true no further items start. */
  shouldStop?: () => boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order. A throwing worker yields `{ ok: false }` for its slot and does
 * not stop the others. Items never claimed because of `shouldStop` stay
 * `undefined`. In-flight items always finish before this resolves.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: MapWithConcurrencyOptions<T, R> = {},
): Promise<Array<Settled<R> | undefined>> {
  const list = items;
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency) || 1)));
  const results = new Array<Settled<R> | undefined>(list.length).fill(undefined);
  let cursor = 0;
  let stopped = false;

  const stopRequested = (): boolean => {
    if (stopped) return true;
    if (!options.shouldStop) return false;
    try {
      stopped = options.shouldStop();
    } catch (err: unknown) {
      log.warn(`shouldStop callback threw: ${errorMessage(err)}`);
    }
    return stopped;
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (stopRequested()) break;
      const currentIndex = cursor;
      cursor += 1;
      const item = list[currentIndex];
      let result: Settled<R>;
      try {
        result = { ok: true, value: await worker(item, currentIndex) };
      } catch (err: unknown) {
        result = { ok: false, error: err };
      }
      results[currentIndex] = result;
      if (options.onSettled) {
        try {
          options.onSettled(result, currentIndex, item);
        } catch (err: unknown) {
          log.warn(`onSettled callback threw: ${errorMessage(err)}`);
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}
