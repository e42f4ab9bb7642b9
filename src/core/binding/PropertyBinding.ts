/**
 * PropertyBinding - 속성 바인딩
 *
 * 소스 객체의 속성 경로와 셀 요소를 연결합니다.
 * - one-time: 생성 시 한 번만 읽음
 * - one-way: 소스 변경을 구독
 * - two-way: 구독 + 입력값을 소스에 다시 씀
 *
 * 변경 구독은 소스가 PropertyChangeSource일 때만 동작하며,
 * 경로의 첫 세그먼트 이름과 같은 속성 변경만 반영합니다.
 */

import { isPropertyChangeSource } from '../ObservableObject';
import type { Unsubscribe } from '../../types';
import { formatValue } from './format';
import { isBlankPath, resolvePath, splitPath, writePath } from './propertyPath';

/**
 * 바인딩 모드
 */
export type BindingMode = 'one-time' | 'one-way' | 'two-way';

/**
 * PropertyBinding 설정
 */
export interface BindingOptions {
  /** 바인딩 소스 */
  source: unknown;
  /** 속성 경로 (빈 값이면 소스 자체) */
  path?: string | null;
  /** 바인딩 모드 @default 'one-way' */
  mode?: BindingMode;
  /** 표시 서식 */
  stringFormat?: string | null;
}

/**
 * 속성 바인딩
 */
export class PropertyBinding {
  readonly source: unknown;
  readonly path: string;
  readonly mode: BindingMode;
  readonly stringFormat: string | null;

  private subscriptions: Unsubscribe[] = [];
  private disposed = false;

  constructor(options: BindingOptions) {
    this.source = options.source;
    this.path = options.path ?? '';
    this.mode = options.mode ?? 'one-way';
    this.stringFormat = options.stringFormat ?? null;
  }

  /**
   * 현재 값
   */
  getValue(): unknown {
    return resolvePath(this.source, this.path);
  }

  /**
   * 서식이 적용된 표시 문자열
   */
  getDisplayText(): string {
    return formatValue(this.getValue(), this.stringFormat);
  }

  /**
   * 소스에 값 쓰기 (two-way 전용)
   *
   * @returns 쓰기 성공 여부
   */
  setValue(value: unknown): boolean {
    if (this.mode !== 'two-way' || this.disposed) return false;

    if (isBlankPath(this.path)) {
      console.warn('[PropertyBinding] Cannot write back without a property path');
      return false;
    }

    if (Object.is(this.getValue(), value)) return true;

    const written = writePath(this.source, this.path, value);
    if (!written) {
      console.warn(`[PropertyBinding] Cannot write "${this.path}": target is not resolvable`);
    }
    return written;
  }

  /**
   * 소스 변경 구독
   *
   * one-time 모드이거나 소스가 변경 알림을 제공하지 않으면 아무것도 하지 않습니다.
   */
  subscribe(listener: (value: unknown) => void): Unsubscribe {
    if (this.mode === 'one-time' || this.disposed || !isPropertyChangeSource(this.source)) {
      return () => {};
    }

    const [rootProperty] = splitPath(this.path);
    const unsubscribe = this.source.onPropertyChanged(({ propertyName }) => {
      if (rootProperty === undefined || propertyName === rootProperty) {
        listener(this.getValue());
      }
    });

    this.subscriptions.push(unsubscribe);
    return () => {
      unsubscribe();
      this.subscriptions = this.subscriptions.filter((entry) => entry !== unsubscribe);
    };
  }

  /**
   * 모든 구독 해제
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
    this.disposed = true;
  }
}
