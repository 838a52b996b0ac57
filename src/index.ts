export { ReorderableList } from './components/ReorderableList';
export { ReorderableItem } from './components/ReorderableItem';
export {
  ReorderProvider,
  useDragSnapshot,
  useReorder,
  useReorderItem,
} from './context/ReorderContext';
export type {
  ReorderHandleProps,
  ReorderItemProps,
  ReorderItemState,
  ReorderProviderProps,
} from './context/ReorderContext';
export { DragStateMachine } from './core/DragStateMachine';
export type { DragController, DragEventSink, DragStateMachineOptions } from './core/DragStateMachine';
export { createPointerInput, createTouchInput } from './core/input';
export type { PointerInput, TouchInput } from './core/input';
export { createDomHitTest, createItemRegistry } from './core/hitTest';
export type { ItemRegistry } from './core/hitTest';
export { createNavigatorHaptics } from './core/haptics';
export type { DragFeedback } from './core/haptics';
export { createConsoleLogger, silentLogger } from './core/logger';
export type { Logger } from './core/logger';
export { compareItems, isDensePermutation, normalizeOrder, reorderItems, sortByOrder } from './core/order';
export { createPersistingSink } from './sink/createPersistingSink';
export type { PersistingSink, PersistingSinkOptions } from './sink/createPersistingSink';
export { reorderConfigSchema, resolveReorderConfig } from './config';
export type { ReorderConfig, ReorderConfigInput } from './config';
export type * from './types';
