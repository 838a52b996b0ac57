import type { ItemId, OrderableItem } from '../types';

const compareIds = (a: ItemId, b: ItemId): number => {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  // Numbers sort ahead of strings
  if (typeof a !== typeof b) {
    return typeof a === 'number' ? -1 : 1;
  }
  const left = String(a);
  const right = String(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
};

/** `order` ascending, ties broken by `id` ascending */
export function compareItems(a: OrderableItem, b: OrderableItem): number {
  if (a.order !== b.order) {
    return a.order - b.order;
  }
  return compareIds(a.id, b.id);
}

export function sortByOrder<T extends OrderableItem>(items: readonly T[]): T[] {
  return [...items].sort(compareItems);
}

export function normalizeOrder<T extends OrderableItem>(items: readonly T[]): T[] {
  return sortByOrder(items).map((item, index) => ({ ...item, order: index }));
}

export function isDensePermutation(items: readonly OrderableItem[]): boolean {
  const seen = new Set<number>();
  for (const { order } of items) {
    if (!Number.isInteger(order) || order < 0 || order >= items.length || seen.has(order)) {
      return false;
    }
    seen.add(order);
  }
  return true;
}

/**
 * Moves `draggedId` into the slot held by `targetId` and reindexes the whole
 * collection from 0. Remove-then-insert: the dragged item is spliced out first,
 * then spliced back in at the target's original index.
 *
 * Returns `null` when the drop is a no-op (same id, or either id missing).
 */
export function reorderItems<T extends OrderableItem>(
  items: readonly T[],
  draggedId: ItemId,
  targetId: ItemId
): T[] | null {
  if (draggedId === targetId) return null;

  const sorted = sortByOrder(items);
  const sourceIndex = sorted.findIndex(item => item.id === draggedId);
  const targetIndex = sorted.findIndex(item => item.id === targetId);

  if (sourceIndex === -1 || targetIndex === -1) return null;

  const [removed] = sorted.splice(sourceIndex, 1);
  sorted.splice(targetIndex, 0, removed);

  return sorted.map((item, index) => ({ ...item, order: index }));
}
