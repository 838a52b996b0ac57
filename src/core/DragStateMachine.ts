import type {
  DragIssue,
  DragSession,
  DragSnapshot,
  InputKind,
  ItemId,
  OrderableItem,
  Position,
  ReorderSink,
} from '../types';
import { silentLogger, type Logger } from './logger';
import { reorderItems } from './order';

/** The normalized vocabulary every input adapter speaks */
export interface DragEventSink {
  start: (itemId: ItemId, position: Position, input: InputKind) => void;
  move: (position: Position, overItemId: ItemId | null) => void;
  end: (position: Position, targetItemId: ItemId | null) => void;
  cancel: () => void;
}

export interface DragController extends DragEventSink {
  getSnapshot: () => DragSnapshot;
  subscribe: (listener: () => void) => () => void;
}

export interface DragStateMachineOptions<T extends OrderableItem> {
  items: readonly T[];
  onReorder: ReorderSink<T>;
  disabled?: boolean;
  logger?: Logger;
}

const IDLE: DragSnapshot = { status: 'idle' };

/**
 * Owns the single drag session of one list. Idle and Dragging are the only
 * states; every Dragging snapshot is followed by exactly one `end` or `cancel`
 * before another `start` is accepted.
 */
export class DragStateMachine<T extends OrderableItem> implements DragController {
  private items: readonly T[];
  private onReorder: ReorderSink<T>;
  private disabled: boolean;
  private readonly logger: Logger;
  private snapshot: DragSnapshot = IDLE;
  private readonly listeners = new Set<() => void>();

  constructor(options: DragStateMachineOptions<T>) {
    this.items = options.items;
    this.onReorder = options.onReorder;
    this.disabled = options.disabled ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  // Arrow properties so they can be handed to useSyncExternalStore as-is
  getSnapshot = (): DragSnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  setItems(items: readonly T[]): void {
    this.items = items;
    const session = this.activeSession();
    if (session && !this.has(session.draggedItemId)) {
      this.report('unknown-item', 'Dragged item left the collection, cancelling drag', {
        itemId: session.draggedItemId,
      });
      this.reset();
    }
  }

  setReorderSink(onReorder: ReorderSink<T>): void {
    this.onReorder = onReorder;
  }

  setDisabled(disabled: boolean): void {
    this.disabled = disabled;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  start = (itemId: ItemId, position: Position, input: InputKind): void => {
    if (this.disabled) {
      this.report('disabled', 'Ignoring drag start while disabled', { itemId });
      return;
    }
    const current = this.activeSession();
    if (current) {
      this.report('nested-drag', 'Ignoring drag start while another drag is active', {
        itemId,
        activeItemId: current.draggedItemId,
      });
      return;
    }
    if (!this.has(itemId)) {
      this.report('unknown-item', 'Ignoring drag start for an item not in the collection', { itemId });
      return;
    }

    this.publish({
      status: 'dragging',
      session: {
        draggedItemId: itemId,
        draggedOverItemId: null,
        origin: position,
        position,
        input,
      },
    });
  };

  move = (position: Position, overItemId: ItemId | null): void => {
    const session = this.activeSession();
    if (!session || this.disabled) return;

    if (!this.has(session.draggedItemId) || (overItemId !== null && !this.has(overItemId))) {
      this.report('unknown-item', 'Drag references an item not in the collection, cancelling drag', {
        itemId: session.draggedItemId,
        overItemId,
      });
      this.reset();
      return;
    }

    // An item is never its own drop target
    const draggedOverItemId = overItemId === session.draggedItemId ? null : overItemId;
    if (
      draggedOverItemId === session.draggedOverItemId &&
      position.x === session.position.x &&
      position.y === session.position.y
    ) {
      return;
    }

    this.publish({
      status: 'dragging',
      session: { ...session, draggedOverItemId, position },
    });
  };

  end = (position: Position, targetItemId: ItemId | null): void => {
    const session = this.activeSession();
    if (!session) return;

    this.reset();

    if (this.disabled) {
      this.report('disabled', 'Drop while disabled, treating as cancel', { itemId: session.draggedItemId });
      return;
    }
    if (targetItemId === null || targetItemId === session.draggedItemId) {
      this.report('no-op-drop', 'Drop without a target', { itemId: session.draggedItemId, position });
      return;
    }

    const reordered = reorderItems(this.items, session.draggedItemId, targetItemId);
    if (!reordered) {
      this.report('unknown-item', 'Drop references an item not in the collection', {
        itemId: session.draggedItemId,
        targetItemId,
      });
      return;
    }

    this.logger.info('Items reordered', {
      itemId: session.draggedItemId,
      targetItemId,
      order: reordered.map(item => item.id),
    });
    this.onReorder(reordered);
  };

  cancel = (): void => {
    if (!this.activeSession()) return;
    this.reset();
  };

  private activeSession(): DragSession | null {
    return this.snapshot.status === 'dragging' ? this.snapshot.session : null;
  }

  private has(itemId: ItemId): boolean {
    return this.items.some(item => item.id === itemId);
  }

  private reset(): void {
    this.publish(IDLE);
  }

  private publish(snapshot: DragSnapshot): void {
    this.snapshot = snapshot;
    this.listeners.forEach(listener => listener());
  }

  private report(issue: DragIssue, message: string, context: Record<string, unknown>): void {
    if (issue === 'no-op-drop' || issue === 'disabled') {
      this.logger.info(message, { issue, ...context });
      return;
    }
    this.logger.warn(message, { issue, ...context });
  }
}
