import { createContext, useCallback, useContext, useEffect, useLayoutEffect, useMemo, useRef, useState, useSyncExternalStore } from 'react';
import type {
  CSSProperties,
  DragEventHandler,
  ReactNode,
  TouchEventHandler,
  TouchList,
} from 'react';
import { DragStateMachine, type DragController } from '../core/DragStateMachine';
import { createNavigatorHaptics } from '../core/haptics';
import { createDomHitTest, createItemRegistry, type ItemRegistry } from '../core/hitTest';
import { createPointerInput, createTouchInput, type PointerInput, type TouchInput, type TouchPoint } from '../core/input';
import type { Logger } from '../core/logger';
import type { DragSnapshot, ItemId, OrderableItem, Position, ReorderSink } from '../types';

interface ReorderContextValue {
  controller: DragController;
  registry: ItemRegistry;
  pointer: PointerInput;
  touch: TouchInput;
  disabled: boolean;
}

const ReorderContext = createContext<ReorderContextValue | null>(null);

export interface ReorderProviderProps<T extends OrderableItem> {
  items: readonly T[];
  onReorder: ReorderSink<T>;
  disabled?: boolean;
  /** Vibrate on touch lift, hover and drop */
  haptics?: boolean;
  /** Read once, when the provider mounts */
  logger?: Logger;
  children: ReactNode;
}

/** Owns one drag engine; every independent list needs its own provider */
export function ReorderProvider<T extends OrderableItem>({
  items,
  onReorder,
  disabled = false,
  haptics = true,
  logger,
  children,
}: ReorderProviderProps<T>) {
  const [machine] = useState(() => new DragStateMachine<T>({ items, onReorder, disabled, logger }));
  const [registry] = useState(createItemRegistry);

  // Keep the engine reading the collection the host rendered last
  useLayoutEffect(() => {
    machine.setItems(items);
  }, [machine, items]);

  useLayoutEffect(() => {
    machine.setReorderSink(onReorder);
  }, [machine, onReorder]);

  useLayoutEffect(() => {
    machine.setDisabled(disabled);
    if (disabled) {
      machine.cancel();
    }
  }, [machine, disabled]);

  const snapshot = useSyncExternalStore(machine.subscribe, machine.getSnapshot, machine.getSnapshot);
  const isDragging = snapshot.status === 'dragging';

  useEffect(() => {
    if (!isDragging) return;

    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') {
        machine.cancel();
      }
    };

    document.addEventListener('keydown', handleKeyDown);
    return () => document.removeEventListener('keydown', handleKeyDown);
  }, [isDragging, machine]);

  const pointer = useMemo(() => createPointerInput(machine), [machine]);
  const touch = useMemo(
    () => createTouchInput(machine, createDomHitTest(registry), haptics ? createNavigatorHaptics() : undefined),
    [machine, registry, haptics]
  );

  const value = useMemo(
    () => ({ controller: machine, registry, pointer, touch, disabled }),
    [machine, registry, pointer, touch, disabled]
  );

  return <ReorderContext.Provider value={value}>{children}</ReorderContext.Provider>;
}

export function useReorder() {
  const context = useContext(ReorderContext);
  if (!context) {
    throw new Error('useReorder must be used within a ReorderProvider');
  }
  return context;
}

export function useDragSnapshot(): DragSnapshot {
  const { controller } = useReorder();
  return useSyncExternalStore(controller.subscribe, controller.getSnapshot, controller.getSnapshot);
}

/** Spread onto the element that starts a drag */
export interface ReorderHandleProps {
  draggable: boolean;
  onDragStart: DragEventHandler<HTMLElement>;
  onDragEnd: DragEventHandler<HTMLElement>;
  onTouchStart: TouchEventHandler<HTMLElement>;
  onTouchMove: TouchEventHandler<HTMLElement>;
  onTouchEnd: TouchEventHandler<HTMLElement>;
  onTouchCancel: TouchEventHandler<HTMLElement>;
  style: CSSProperties;
}

/** Spread onto the element that represents the whole item */
export interface ReorderItemProps {
  ref: (element: HTMLElement | null) => void;
  'data-drag-item': string;
  'data-item-id': string;
  onDragOver: DragEventHandler<HTMLElement>;
  onDrop: DragEventHandler<HTMLElement>;
}

export interface ReorderItemState {
  isDragging: boolean;
  isDraggedOver: boolean;
  /** Finger travel since touch start; null unless this item is being touch-dragged */
  offset: Position | null;
}

const pointOf = (event: { clientX: number; clientY: number }): Position => ({
  x: event.clientX,
  y: event.clientY,
});

const touchPoints = (touches: TouchList): TouchPoint[] => {
  const points: TouchPoint[] = [];
  for (let i = 0; i < touches.length; i++) {
    const touch = touches[i];
    points.push({ identifier: touch.identifier, position: { x: touch.clientX, y: touch.clientY } });
  }
  return points;
};

export function useReorderItem(itemId: ItemId): ReorderItemState & {
  handleProps: ReorderHandleProps;
  itemProps: ReorderItemProps;
} {
  const { controller, registry, pointer, touch, disabled } = useReorder();
  const snapshot = useDragSnapshot();
  const session = snapshot.status === 'dragging' ? snapshot.session : null;

  const isDragging = session !== null && session.draggedItemId === itemId;
  const isDraggedOver = session !== null && session.draggedOverItemId === itemId;
  const offset =
    session !== null && session.draggedItemId === itemId && session.input === 'touch'
      ? { x: session.position.x - session.origin.x, y: session.position.y - session.origin.y }
      : null;

  const unregisterRef = useRef<(() => void) | null>(null);
  const ref = useCallback(
    (element: HTMLElement | null) => {
      unregisterRef.current?.();
      unregisterRef.current = element ? registry.register(itemId, element) : null;
    },
    [registry, itemId]
  );

  const handleProps: ReorderHandleProps = {
    draggable: !disabled,
    onDragStart: (event) => {
      const point = pointOf(event);
      if (event.dataTransfer) {
        event.dataTransfer.effectAllowed = 'move';
        event.dataTransfer.setData('text/plain', String(itemId));
        // Drag the whole item rather than a ghost of the handle
        const itemElement = event.currentTarget.closest('[data-drag-item]');
        if (itemElement instanceof HTMLElement) {
          const rect = itemElement.getBoundingClientRect();
          event.dataTransfer.setDragImage(itemElement, point.x - rect.left, point.y - rect.top);
        }
      }
      pointer.dragStart(itemId, point);
    },
    onDragEnd: () => pointer.dragEnd(),
    onTouchStart: (event) => {
      const [started] = touchPoints(event.changedTouches);
      if (started) touch.touchStart(itemId, started);
    },
    onTouchMove: (event) => touch.touchMove(touchPoints(event.changedTouches)),
    onTouchEnd: (event) => touch.touchEnd(touchPoints(event.changedTouches)),
    onTouchCancel: (event) => touch.touchCancel(touchPoints(event.changedTouches)),
    style: {
      cursor: disabled ? 'default' : isDragging ? 'grabbing' : 'grab',
      touchAction: 'none',
    },
  };

  const itemProps: ReorderItemProps = {
    ref,
    'data-drag-item': '',
    'data-item-id': String(itemId),
    onDragOver: (event) => {
      if (controller.getSnapshot().status !== 'dragging') return;
      // Accepting the drop requires cancelling dragover
      event.preventDefault();
      if (event.dataTransfer) {
        event.dataTransfer.dropEffect = 'move';
      }
      pointer.dragOver(itemId, pointOf(event));
    },
    onDrop: (event) => {
      if (controller.getSnapshot().status !== 'dragging') return;
      event.preventDefault();
      pointer.drop(itemId, pointOf(event));
    },
  };

  return { isDragging, isDraggedOver, offset, handleProps, itemProps };
}
