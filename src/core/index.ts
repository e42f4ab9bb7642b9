/**
 * Core 모듈 진입점
 */

export { SimpleEventEmitter } from './SimpleEventEmitter';
export { ObservableObject, isPropertyChangeSource } from './ObservableObject';
export type { PropertyChangeSource, PropertyChangedEvents } from './ObservableObject';
export { ObservableList } from './ObservableList';
export type { CollectionChangeAction, CollectionChangedPayload } from './ObservableList';
export * from './binding';
