/**
 * ObservableObject - 속성 변경 알림 기반 클래스
 *
 * 행에 바인딩되는 데이터 항목이 상속합니다.
 * PropertyBinding은 이 알림을 받아 셀 내용을 갱신합니다.
 *
 * @example
 * ```ts
 * class Person extends ObservableObject {
 *   private _name = '';
 *   get name() { return this._name; }
 *   set name(value: string) {
 *     const old = this._name;
 *     this._name = value;
 *     this.notifyPropertyChanged('name', old, value);
 *   }
 * }
 * ```
 */

import { SimpleEventEmitter } from './SimpleEventEmitter';
import type { PropertyChangedPayload, Unsubscribe } from '../types';

/**
 * 속성 변경 알림을 제공하는 객체
 */
export interface PropertyChangeSource {
  onPropertyChanged(handler: (payload: PropertyChangedPayload) => void): Unsubscribe;
}

/**
 * PropertyChangeSource 타입 가드
 */
export function isPropertyChangeSource(value: unknown): value is PropertyChangeSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'onPropertyChanged' in value &&
    typeof value.onPropertyChanged === 'function'
  );
}

/**
 * 속성 변경 이벤트 맵
 */
export interface PropertyChangedEvents {
  propertyChanged: PropertyChangedPayload;
}

/**
 * 속성 변경 알림 기반 클래스
 */
export class ObservableObject extends SimpleEventEmitter<PropertyChangedEvents> implements PropertyChangeSource {
  /**
   * 속성 변경 구독
   */
  onPropertyChanged(handler: (payload: PropertyChangedPayload) => void): Unsubscribe {
    return this.on('propertyChanged', handler);
  }

  /**
   * 속성 변경 알림 (값이 같으면 무시)
   */
  protected notifyPropertyChanged(propertyName: string, oldValue: unknown, newValue: unknown): void {
    if (oldValue === newValue) return;
    this.emit('propertyChanged', { propertyName, oldValue, newValue });
  }
}
