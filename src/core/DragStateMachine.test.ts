import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DragSnapshot } from '../types';
import { DragStateMachine } from './DragStateMachine';
import type { Logger } from './logger';

interface Service {
  id: string;
  order: number;
  title: string;
}

const services = (): Service[] => [
  { id: 'A', order: 0, title: 'Web' },
  { id: 'B', order: 1, title: 'Mobile' },
  { id: 'C', order: 2, title: 'DevOps' },
  { id: 'D', order: 3, title: 'Design' },
];

const origin = { x: 10, y: 20 };

const createLogger = (): Logger & { info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> } => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const sessionOf = (snapshot: DragSnapshot) => (snapshot.status === 'dragging' ? snapshot.session : null);

describe('DragStateMachine', () => {
  let onReorder: ReturnType<typeof vi.fn>;
  let logger: ReturnType<typeof createLogger>;
  let machine: DragStateMachine<Service>;

  beforeEach(() => {
    onReorder = vi.fn();
    logger = createLogger();
    machine = new DragStateMachine<Service>({ items: services(), onReorder, logger });
  });

  describe('start', () => {
    it('should open a session for a known item', () => {
      machine.start('B', origin, 'pointer');

      expect(machine.getSnapshot()).toEqual({
        status: 'dragging',
        session: {
          draggedItemId: 'B',
          draggedOverItemId: null,
          origin,
          position: origin,
          input: 'pointer',
        },
      });
    });

    it('should ignore an unknown item', () => {
      machine.start('Z', origin, 'pointer');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(logger.warn).toHaveBeenCalledWith(
        'Ignoring drag start for an item not in the collection',
        { issue: 'unknown-item', itemId: 'Z' }
      );
    });

    it('should keep tracking only the first item when a second start arrives', () => {
      machine.start('A', origin, 'pointer');
      machine.start('C', { x: 0, y: 0 }, 'touch');

      expect(sessionOf(machine.getSnapshot())?.draggedItemId).toBe('A');
      expect(sessionOf(machine.getSnapshot())?.input).toBe('pointer');
      expect(logger.warn).toHaveBeenCalledWith(
        'Ignoring drag start while another drag is active',
        { issue: 'nested-drag', itemId: 'C', activeItemId: 'A' }
      );
    });

    it('should refuse to start while disabled', () => {
      machine.setDisabled(true);

      machine.start('A', origin, 'pointer');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
    });

    it('should never start on an empty collection', () => {
      machine.setItems([]);

      machine.start('A', origin, 'touch');

      expect(machine.getSnapshot().status).toBe('idle');
    });
  });

  describe('move', () => {
    it('should track the hovered item and position', () => {
      machine.start('A', origin, 'touch');
      machine.move({ x: 10, y: 80 }, 'C');

      const session = sessionOf(machine.getSnapshot());
      expect(session?.draggedOverItemId).toBe('C');
      expect(session?.position).toEqual({ x: 10, y: 80 });
      expect(session?.origin).toEqual(origin);
    });

    it('should clear the hover target when over the dragged item itself', () => {
      machine.start('A', origin, 'pointer');
      machine.move(origin, 'B');
      machine.move(origin, 'A');

      expect(sessionOf(machine.getSnapshot())?.draggedOverItemId).toBeNull();
    });

    it('should clear the hover target when over nothing', () => {
      machine.start('A', origin, 'pointer');
      machine.move(origin, 'B');
      machine.move(origin, null);

      expect(sessionOf(machine.getSnapshot())?.draggedOverItemId).toBeNull();
    });

    it('should be a no-op while idle', () => {
      const listener = vi.fn();
      machine.subscribe(listener);

      machine.move(origin, 'B');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should not publish when nothing changed', () => {
      machine.start('A', origin, 'pointer');
      machine.move(origin, 'B');
      const listener = vi.fn();
      machine.subscribe(listener);

      machine.move(origin, 'B');

      expect(listener).not.toHaveBeenCalled();
    });

    it('should cancel when hovering an item no longer in the collection', () => {
      machine.start('A', origin, 'pointer');

      machine.move(origin, 'Z');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(onReorder).not.toHaveBeenCalled();
    });
  });

  describe('end', () => {
    it('should reorder A onto C and return to idle', () => {
      machine.start('A', origin, 'pointer');
      machine.move(origin, 'C');
      machine.end(origin, 'C');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(onReorder).toHaveBeenCalledTimes(1);
      expect(onReorder).toHaveBeenCalledWith([
        { id: 'B', order: 0, title: 'Mobile' },
        { id: 'C', order: 1, title: 'DevOps' },
        { id: 'A', order: 2, title: 'Web' },
        { id: 'D', order: 3, title: 'Design' },
      ]);
    });

    it('should reorder D onto A', () => {
      machine.start('D', origin, 'touch');
      machine.end(origin, 'A');

      const [[reordered]] = onReorder.mock.calls;
      expect(reordered.map((item: Service) => `${item.id}${item.order}`)).toEqual(['D0', 'A1', 'B2', 'C3']);
    });

    it('should not call the sink when dropped on itself', () => {
      const items = services();
      machine.setItems(items);

      machine.start('B', origin, 'pointer');
      machine.end(origin, 'B');

      expect(onReorder).not.toHaveBeenCalled();
      expect(items).toEqual(services());
      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
    });

    it('should not call the sink when dropped on nothing', () => {
      machine.start('B', origin, 'pointer');
      machine.end(origin, null);

      expect(onReorder).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith('Drop without a target', {
        issue: 'no-op-drop',
        itemId: 'B',
        position: origin,
      });
    });

    it('should be a no-op when the target was removed mid-drag', () => {
      machine.start('A', origin, 'pointer');
      machine.setItems(services().filter(item => item.id !== 'C'));

      expect(() => machine.end(origin, 'C')).not.toThrow();
      expect(onReorder).not.toHaveBeenCalled();
      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
    });

    it('should reorder against the collection current at drop time', () => {
      machine.start('A', origin, 'pointer');
      machine.setItems([
        { id: 'A', order: 0, title: 'Web' },
        { id: 'C', order: 1, title: 'DevOps' },
        { id: 'E', order: 2, title: 'Copywriting' },
      ]);
      machine.end(origin, 'E');

      expect(onReorder).toHaveBeenCalledWith([
        { id: 'C', order: 0, title: 'DevOps' },
        { id: 'E', order: 1, title: 'Copywriting' },
        { id: 'A', order: 2, title: 'Web' },
      ]);
    });

    it('should use the latest sink', () => {
      const next = vi.fn();
      machine.setReorderSink(next);

      machine.start('A', origin, 'pointer');
      machine.end(origin, 'B');

      expect(onReorder).not.toHaveBeenCalled();
      expect(next).toHaveBeenCalledTimes(1);
    });

    it('should be idle before the sink runs, even when it throws', () => {
      let statusSeenBySink: string | null = null;
      machine.setReorderSink(() => {
        statusSeenBySink = machine.getSnapshot().status;
        throw new Error('sink failed');
      });

      machine.start('A', origin, 'pointer');

      expect(() => machine.end(origin, 'B')).toThrow('sink failed');
      expect(statusSeenBySink).toBe('idle');
      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
    });

    it('should accept a new start after a completed drag', () => {
      machine.start('A', origin, 'pointer');
      machine.end(origin, 'B');
      machine.start('C', origin, 'touch');

      expect(sessionOf(machine.getSnapshot())?.draggedItemId).toBe('C');
    });
  });

  describe('cancel', () => {
    it('should discard the session without reordering', () => {
      const items = services();
      machine.setItems(items);

      machine.start('A', origin, 'pointer');
      machine.move(origin, 'C');
      machine.cancel();

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(onReorder).not.toHaveBeenCalled();
      expect(items).toEqual(services());
    });

    it('should be idempotent while idle', () => {
      const listener = vi.fn();
      machine.subscribe(listener);

      machine.cancel();
      machine.cancel();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('disabled mid-gesture', () => {
    it('should still accept cancel', () => {
      machine.start('A', origin, 'pointer');
      machine.setDisabled(true);

      machine.cancel();

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
    });

    it('should treat a drop as a cancel', () => {
      machine.start('A', origin, 'pointer');
      machine.setDisabled(true);

      machine.end(origin, 'C');

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(onReorder).not.toHaveBeenCalled();
    });
  });

  describe('setItems', () => {
    it('should cancel a drag whose item was removed', () => {
      machine.start('B', origin, 'pointer');

      machine.setItems(services().filter(item => item.id !== 'B'));

      expect(machine.getSnapshot()).toEqual({ status: 'idle' });
      expect(logger.warn).toHaveBeenCalledWith('Dragged item left the collection, cancelling drag', {
        issue: 'unknown-item',
        itemId: 'B',
      });
    });
  });

  describe('subscribe', () => {
    it('should notify on every transition until unsubscribed', () => {
      const listener = vi.fn();
      const unsubscribe = machine.subscribe(listener);

      machine.start('A', origin, 'pointer');
      machine.move(origin, 'B');
      machine.cancel();
      unsubscribe();
      machine.start('A', origin, 'pointer');

      expect(listener).toHaveBeenCalledTimes(3);
    });
  });
});
