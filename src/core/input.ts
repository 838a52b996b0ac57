import type { HitTest, ItemId, Position } from '../types';
import type { DragController } from './DragStateMachine';
import type { DragFeedback } from './haptics';

/** Native HTML drag-and-drop: the browser reports the hovered item itself */
export interface PointerInput {
  dragStart: (itemId: ItemId, position: Position) => void;
  dragOver: (itemId: ItemId, position: Position) => void;
  dragLeave: (position: Position) => void;
  drop: (itemId: ItemId, position: Position) => void;
  dragEnd: () => void;
}

/** One finger from a touch event's `changedTouches` */
export interface TouchPoint {
  identifier: number;
  position: Position;
}

/**
 * Touch gestures: targets are resolved by hit-testing the finger position.
 * Only the finger that opened the session moves, drops or cancels it.
 */
export interface TouchInput {
  touchStart: (itemId: ItemId, touch: TouchPoint) => void;
  touchMove: (changed: readonly TouchPoint[]) => void;
  touchEnd: (changed: readonly TouchPoint[]) => void;
  touchCancel: (changed: readonly TouchPoint[]) => void;
}

const isDragging = (controller: DragController) => controller.getSnapshot().status === 'dragging';

export function createPointerInput(controller: DragController): PointerInput {
  return {
    dragStart(itemId, position) {
      controller.start(itemId, position, 'pointer');
    },
    dragOver(itemId, position) {
      controller.move(position, itemId);
    },
    dragLeave(position) {
      controller.move(position, null);
    },
    drop(itemId, position) {
      controller.end(position, itemId);
    },
    // Fires after drop as well; cancel is a no-op once the session has ended
    dragEnd() {
      controller.cancel();
    },
  };
}

export function createTouchInput(
  controller: DragController,
  hitTest: HitTest,
  feedback?: DragFeedback
): TouchInput {
  let activeTouch: number | null = null;

  const trackedPoint = (changed: readonly TouchPoint[]): Position | null => {
    const snapshot = controller.getSnapshot();
    if (snapshot.status !== 'dragging' || snapshot.session.input !== 'touch') return null;
    const point = changed.find(touch => touch.identifier === activeTouch);
    return point ? point.position : null;
  };

  return {
    touchStart(itemId, touch) {
      const wasDragging = isDragging(controller);
      controller.start(itemId, touch.position, 'touch');
      if (!wasDragging && isDragging(controller)) {
        activeTouch = touch.identifier;
        feedback?.lift();
      }
    },
    touchMove(changed) {
      const position = trackedPoint(changed);
      const before = controller.getSnapshot();
      if (position === null || before.status !== 'dragging') return;

      controller.move(position, hitTest(position));

      const after = controller.getSnapshot();
      if (
        after.status === 'dragging' &&
        after.session.draggedOverItemId !== null &&
        after.session.draggedOverItemId !== before.session.draggedOverItemId
      ) {
        feedback?.hover();
      }
    },
    touchEnd(changed) {
      const position = trackedPoint(changed);
      const snapshot = controller.getSnapshot();
      if (position === null || snapshot.status !== 'dragging') return;

      activeTouch = null;
      const targetItemId = hitTest(position);
      if (targetItemId !== null && targetItemId !== snapshot.session.draggedItemId) {
        feedback?.drop();
      }
      controller.end(position, targetItemId);
    },
    touchCancel(changed) {
      if (trackedPoint(changed) === null) return;
      activeTouch = null;
      controller.cancel();
    },
  };
}
