/**
 * SimpleEventEmitter - 제네릭 이벤트 발행/구독 시스템
 *
 * 그리드, 컬럼, 컬렉션 등 모든 관찰 가능한 객체의 기반 클래스입니다.
 * 이벤트 이름과 페이로드 타입을 자유롭게 정의할 수 있습니다.
 */

import type { Unsubscribe } from '../types';

/**
 * 이벤트 핸들러 타입
 */
type EventHandler<T> = (payload: T) => void;

/**
 * 제네릭 이벤트 발행/구독 클래스
 *
 * @template Events - 이벤트 이름과 페이로드 타입의 맵
 *
 * @example
 * ```ts
 * interface MyEvents {
 *   click: { x: number; y: number };
 *   change: string;
 * }
 *
 * const emitter = new SimpleEventEmitter<MyEvents>();
 * emitter.on('click', ({ x, y }) => console.log(x, y));
 * emitter.emit('click', { x: 10, y: 20 });
 * ```
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners = new Map<keyof Events, Set<EventHandler<never>>>();

  /**
   * 이벤트 구독
   *
   * @returns 구독 해제 함수
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): Unsubscribe {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    const registered = handlers;
    return () => {
      registered.delete(handler);
      if (registered.size === 0 && this.listeners.get(event) === registered) {
        this.listeners.delete(event);
      }
    };
  }

  /**
   * 이벤트 발행
   *
   * 핸들러 하나가 예외를 던져도 나머지 핸들러는 계속 호출됩니다.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as EventHandler<Events[K]>)(payload);
      } catch (error) {
        console.error(`[SimpleEventEmitter] Handler error for "${String(event)}":`, error);
      }
    }
  }

  /**
   * 구독자 수
   */
  listenerCount(event: keyof Events): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /**
   * 모든 리스너 제거
   */
  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * 리소스 정리
   */
  destroy(): void {
    this.removeAllListeners();
  }
}
