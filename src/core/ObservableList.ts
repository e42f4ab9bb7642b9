/**
 * ObservableList - 변경 알림 컬렉션
 *
 * 그리드의 컬럼 목록에 사용됩니다.
 * 추가/삭제/교체/이동/초기화 시 collectionChanged 이벤트를 발행합니다.
 */

import { SimpleEventEmitter } from './SimpleEventEmitter';

/**
 * 컬렉션 변경 종류
 */
export type CollectionChangeAction = 'add' | 'remove' | 'replace' | 'move' | 'reset';

/**
 * 컬렉션 변경 이벤트 페이로드
 */
export interface CollectionChangedPayload<T> {
  action: CollectionChangeAction;
  /** 추가/교체된 항목 */
  newItems: readonly T[];
  /** 제거/교체된 항목 */
  oldItems: readonly T[];
  /** 변경 위치 (reset은 -1) */
  index: number;
}

interface ObservableListEvents<T> {
  collectionChanged: CollectionChangedPayload<T>;
}

/**
 * 변경 알림 컬렉션
 *
 * null/undefined 항목은 담지 않습니다.
 */
export class ObservableList<T extends NonNullable<unknown>> extends SimpleEventEmitter<ObservableListEvents<T>> implements Iterable<T> {
  private items: T[];

  constructor(items: Iterable<T> = []) {
    super();
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  includes(item: T): boolean {
    return this.items.includes(item);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  add(item: T): void {
    this.insert(this.items.length, item);
  }

  insert(index: number, item: T): void {
    this.assertIndex(index, this.items.length);
    this.items.splice(index, 0, item);
    this.emit('collectionChanged', { action: 'add', newItems: [item], oldItems: [], index });
  }

  removeAt(index: number): T {
    const removed = this.itemAt(index);
    this.items.splice(index, 1);
    this.emit('collectionChanged', { action: 'remove', newItems: [], oldItems: [removed], index });
    return removed;
  }

  /**
   * 항목 제거
   *
   * @returns 제거 여부
   */
  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index === -1) return false;
    this.removeAt(index);
    return true;
  }

  set(index: number, item: T): void {
    const old = this.itemAt(index);
    if (old === item) return;
    this.items[index] = item;
    this.emit('collectionChanged', { action: 'replace', newItems: [item], oldItems: [old], index });
  }

  move(fromIndex: number, toIndex: number): void {
    const moved = this.itemAt(fromIndex);
    this.assertIndex(toIndex, this.items.length - 1);
    if (fromIndex === toIndex) return;

    this.items.splice(fromIndex, 1);
    this.items.splice(toIndex, 0, moved);
    this.emit('collectionChanged', { action: 'move', newItems: [moved], oldItems: [moved], index: toIndex });
  }

  clear(): void {
    this.reset([]);
  }

  /**
   * 전체 교체
   */
  reset(items: Iterable<T>): void {
    const oldItems = this.items;
    this.items = [...items];
    this.emit('collectionChanged', { action: 'reset', newItems: [...this.items], oldItems, index: -1 });
  }

  private itemAt(index: number): T {
    const item = Number.isInteger(index) ? this.items[index] : undefined;
    if (item === undefined) {
      throw new RangeError(`[ObservableList] Index ${index} is out of range (0..${this.items.length - 1})`);
    }
    return item;
  }

  private assertIndex(index: number, max: number): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw new RangeError(`[ObservableList] Index ${index} is out of range (0..${max})`);
    }
  }
}
