import { silentLogger, type Logger } from '../core/logger';
import type { ItemId, OrderableItem, ReorderSink } from '../types';

export interface PersistingSinkOptions<T extends OrderableItem> {
  /** Current collection, captured before the optimistic update for rollback */
  getItems: () => T[];
  /** Replaces the host's collection */
  apply: (items: T[]) => void;
  /** Stores the new order, e.g. a bulk "update order" request with ids in display order */
  persist: (orderedIds: ItemId[]) => Promise<void>;
  onError?: (error: unknown) => void;
  logger?: Logger;
}

export interface PersistingSink<T extends OrderableItem> {
  onReorder: ReorderSink<T>;
  /** Resolves once the most recent persist call has finished, successfully or not */
  settled: () => Promise<void>;
}

/**
 * Applies each reorder optimistically and rolls back to the previous
 * collection when persisting fails. A failure is not rolled back when a newer
 * reorder has been applied since; that newer order is still in flight.
 */
export function createPersistingSink<T extends OrderableItem>({
  getItems,
  apply,
  persist,
  onError,
  logger = silentLogger,
}: PersistingSinkOptions<T>): PersistingSink<T> {
  let revision = 0;
  let inflight: Promise<void> = Promise.resolve();

  const onReorder: ReorderSink<T> = (items) => {
    const previous = getItems();
    const current = ++revision;
    const orderedIds = items.map(item => item.id);

    apply(items);

    // A synchronous throw from persist is treated as a rejection
    inflight = new Promise<void>((resolve) => resolve(persist(orderedIds))).then(
      () => {
        logger.info('Order persisted', { orderedIds });
      },
      (error: unknown) => {
        logger.error('Failed to persist order', {
          orderedIds,
          error: error instanceof Error ? error.message : String(error),
        });
        if (current === revision) {
          apply(previous);
        }
        onError?.(error);
      }
    );
  };

  return {
    onReorder,
    settled: () => inflight,
  };
}
