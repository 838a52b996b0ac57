export type ItemId = string | number;

export type InputKind = 'pointer' | 'touch';

export interface Position {
    x: number;
    y: number;
}

/** Anything the list can reorder: a stable id plus a dense zero-based `order` */
export interface OrderableItem {
    id: ItemId;
    order: number;
}

/** One drag gesture, alive from start until drop or cancel */
export interface DragSession {
    /** ID of the lifted item */
    draggedItemId: ItemId;
    /** ID of the item currently under the pointer or finger */
    draggedOverItemId: ItemId | null;
    /** Coordinate where the gesture started */
    origin: Position;
    /** Latest coordinate seen during the gesture */
    position: Position;
    /** Adapter that opened the session; only read by the visual layer */
    input: InputKind;
}

export type DragSnapshot =
    | { status: 'idle' }
    | { status: 'dragging'; session: DragSession };

/** Receives the entire reindexed collection once per completed drag */
export type ReorderSink<T extends OrderableItem> = (items: T[]) => void;

/** Resolves which registered item, if any, sits under a coordinate */
export type HitTest = (position: Position) => ItemId | null;

/** Conditions the engine absorbs instead of throwing */
export type DragIssue = 'unknown-item' | 'nested-drag' | 'no-op-drop' | 'disabled';
