/**
 * SimpleEventEmitter 테스트
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SimpleEventEmitter } from '../../src/core/SimpleEventEmitter';

interface TestEvents {
  click: { x: number; y: number };
  change: string;
}

describe('SimpleEventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('구독한 핸들러에 페이로드 전달', () => {
    const emitter = new SimpleEventEmitter<TestEvents>();
    const handler = vi.fn();

    emitter.on('click', handler);
    emitter.emit('click', { x: 10, y: 20 });

    expect(handler).toHaveBeenCalledWith({ x: 10, y: 20 });
  });

  it('구독 해제 후에는 호출되지 않음', () => {
    const emitter = new SimpleEventEmitter<TestEvents>();
    const handler = vi.fn();

    const unsubscribe = emitter.on('change', handler);
    unsubscribe();
    emitter.emit('change', 'a');

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('change')).toBe(0);
  });

  it('핸들러 예외가 다른 핸들러를 막지 않음', () => {
    const emitter = new SimpleEventEmitter<TestEvents>();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const second = vi.fn();

    emitter.on('change', () => {
      throw new Error('boom');
    });
    emitter.on('change', second);
    emitter.emit('change', 'value');

    expect(second).toHaveBeenCalledWith('value');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toBe('[SimpleEventEmitter] Handler error for "change":');
  });

  it('removeAllListeners()로 특정 이벤트만 제거', () => {
    const emitter = new SimpleEventEmitter<TestEvents>();
    emitter.on('click', vi.fn());
    emitter.on('change', vi.fn());

    emitter.removeAllListeners('click');

    expect(emitter.listenerCount('click')).toBe(0);
    expect(emitter.listenerCount('change')).toBe(1);
  });
});
