import { useMemo } from 'react';
import type { DragEvent, ElementType, ReactNode } from 'react';
import { resolveReorderConfig } from '../config';
import { ReorderProvider, useReorder, type ReorderHandleProps, type ReorderItemState } from '../context/ReorderContext';
import type { Logger } from '../core/logger';
import { sortByOrder } from '../core/order';
import type { OrderableItem, ReorderSink } from '../types';
import { ReorderableItem } from './ReorderableItem';
import './ReorderableList.css';

interface ReorderableListProps<T extends OrderableItem> {
  /** HTML element or component to render as (default: 'div') */
  as?: ElementType;
  /** Items to render; displayed sorted by `order`, then `id` */
  items: readonly T[];
  /** Called once per completed drag with the entire reindexed collection */
  onReorder: ReorderSink<T>;
  /** Renders one item; spread `handleProps` on its drag handle */
  renderItem: (item: T, state: ReorderItemState, handleProps: ReorderHandleProps) => ReactNode;
  /** Additional CSS class names */
  className?: string;
  disabled?: boolean;
  haptics?: boolean;
  showInstructions?: boolean;
  emptyMessage?: string;
  instructions?: string;
  logger?: Logger;
}

export function ReorderableList<T extends OrderableItem>({
  as,
  items,
  onReorder,
  renderItem,
  className = '',
  logger,
  disabled,
  haptics,
  showInstructions,
  emptyMessage,
  instructions,
}: ReorderableListProps<T>) {
  const config = useMemo(
    () => resolveReorderConfig({ disabled, haptics, showInstructions, emptyMessage, instructions }, logger),
    [disabled, haptics, showInstructions, emptyMessage, instructions, logger]
  );
  const sortedItems = useMemo(() => sortByOrder(items), [items]);

  return (
    <ReorderProvider
      items={sortedItems}
      onReorder={onReorder}
      disabled={config.disabled}
      haptics={config.haptics}
      logger={logger}
    >
      <ListBody as={as} className={className}>
        {sortedItems.map((item) => (
          <ReorderableItem key={item.id} id={item.id}>
            {(state, handleProps) => renderItem(item, state, handleProps)}
          </ReorderableItem>
        ))}

        {sortedItems.length === 0 && <div className="reorder-list__empty">{config.emptyMessage}</div>}

        {config.showInstructions && !config.disabled && sortedItems.length > 1 && (
          <div className="reorder-list__instructions">{config.instructions}</div>
        )}
      </ListBody>
    </ReorderProvider>
  );
}

function ListBody({
  as: Component = 'div',
  className,
  children,
}: {
  as?: ElementType;
  className: string;
  children: ReactNode;
}) {
  const { controller, pointer, disabled } = useReorder();

  // Clear the drop target once the pointer leaves the list, not when it crosses between items
  const handleDragLeave = (event: DragEvent<HTMLElement>) => {
    if (controller.getSnapshot().status !== 'dragging') return;
    const next = event.relatedTarget;
    if (next instanceof Node && event.currentTarget.contains(next)) return;
    pointer.dragLeave({ x: event.clientX, y: event.clientY });
  };

  return (
    <Component
      className={`reorder-list ${disabled ? 'reorder-list--disabled' : ''} ${className}`}
      onDragLeave={handleDragLeave}
    >
      {children}
    </Component>
  );
}
