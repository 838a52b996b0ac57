import type { ElementType, ReactNode } from 'react';
import { useReorder, useReorderItem, type ReorderHandleProps, type ReorderItemState } from '../context/ReorderContext';
import type { ItemId } from '../types';
import './ReorderableItem.css';

interface ReorderableItemProps {
  /** HTML element or component to render as (default: 'div') */
  as?: ElementType;
  /** Identifier of the item this element represents */
  id: ItemId;
  /** Renders the item; spread `handleProps` on the drag handle */
  children: (state: ReorderItemState, handleProps: ReorderHandleProps) => ReactNode;
  /** Additional CSS class names */
  className?: string;
}

export function ReorderableItem({ as: Component = 'div', id, children, className = '' }: ReorderableItemProps) {
  const { disabled } = useReorder();
  const { isDragging, isDraggedOver, offset, handleProps, itemProps } = useReorderItem(id);

  const classes = [
    'reorder-item',
    isDragging ? 'reorder-item--dragging' : '',
    isDraggedOver ? 'reorder-item--over' : '',
    disabled ? 'reorder-item--disabled' : '',
    className,
  ]
    .filter(Boolean)
    .join(' ');

  return (
    <Component
      {...itemProps}
      className={classes}
      style={offset ? { transform: `translateY(${offset.y}px) scale(1.02) rotate(2deg)`, zIndex: 1000 } : undefined}
    >
      {children({ isDragging, isDraggedOver, offset }, handleProps)}
    </Component>
  );
}
