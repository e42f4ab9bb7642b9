/**
 * PropertyBinding 테스트
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PropertyBinding } from '../../../src/core/binding/PropertyBinding';
import { resolvePath, writePath } from '../../../src/core/binding/propertyPath';
import { Employee, createEmployees } from '../../fixtures/employees';

describe('PropertyBinding', () => {
  let employee: Employee;

  beforeEach(() => {
    [employee] = createEmployees();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // 경로 해석
  // ===========================================================================

  describe('경로 해석', () => {
    it('중첩 경로 읽기', () => {
      expect(resolvePath(employee, 'address.city')).toBe('Seoul');
    });

    it('빈 경로와 "."은 소스 자체', () => {
      expect(resolvePath(employee, '')).toBe(employee);
      expect(resolvePath(employee, '.')).toBe(employee);
    });

    it('중간 값이 없으면 undefined', () => {
      expect(resolvePath({ a: null }, 'a.b')).toBeUndefined();
      expect(resolvePath(42, 'toFixed')).toBeUndefined();
    });

    it('중첩 경로 쓰기', () => {
      const source = { address: { city: 'Seoul' } };
      expect(writePath(source, 'address.city', 'Daegu')).toBe(true);
      expect(source.address.city).toBe('Daegu');
    });
  });

  // ===========================================================================
  // 읽기 / 쓰기
  // ===========================================================================

  describe('읽기/쓰기', () => {
    it('stringFormat 적용된 표시 문자열', () => {
      const binding = new PropertyBinding({ source: employee, path: 'salary', stringFormat: '{0:N2}' });
      expect(binding.getValue()).toBe(4200.5);
      expect(binding.getDisplayText()).toBe('4,200.50');
    });

    it('one-way는 쓰지 않음', () => {
      const binding = new PropertyBinding({ source: employee, path: 'name' });
      expect(binding.setValue('변경')).toBe(false);
      expect(employee.name).toBe('김민준');
    });

    it('two-way는 소스에 쓰고 변경 알림 발생', () => {
      const binding = new PropertyBinding({ source: employee, path: 'name', mode: 'two-way' });
      const handler = vi.fn();
      employee.onPropertyChanged(handler);

      expect(binding.setValue('정하은')).toBe(true);

      expect(employee.name).toBe('정하은');
      expect(handler).toHaveBeenCalledWith({ propertyName: 'name', oldValue: '김민준', newValue: '정하은' });
    });

    it('대상을 찾을 수 없으면 경고 후 false', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const binding = new PropertyBinding({ source: {}, path: 'a.b', mode: 'two-way' });

      expect(binding.setValue(1)).toBe(false);
      expect(warnSpy).toHaveBeenCalledWith('[PropertyBinding] Cannot write "a.b": target is not resolvable');
    });
  });

  // ===========================================================================
  // 변경 구독
  // ===========================================================================

  describe('변경 구독', () => {
    it('같은 속성 변경만 전달', () => {
      const binding = new PropertyBinding({ source: employee, path: 'age' });
      const listener = vi.fn();
      binding.subscribe(listener);

      employee.name = '다른 이름';
      employee.age = 32;

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(32);
    });

    it('중첩 경로는 첫 세그먼트 변경에 반응', () => {
      const binding = new PropertyBinding({ source: employee, path: 'hireDate.getFullYear' });
      const listener = vi.fn();
      binding.subscribe(listener);

      employee.hireDate = new Date(2022, 0, 1);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('one-time은 구독하지 않음', () => {
      const binding = new PropertyBinding({ source: employee, path: 'age', mode: 'one-time' });
      const listener = vi.fn();
      binding.subscribe(listener);

      employee.age = 40;

      expect(listener).not.toHaveBeenCalled();
    });

    it('dispose() 후에는 전달하지 않음', () => {
      const binding = new PropertyBinding({ source: employee, path: 'age' });
      const listener = vi.fn();
      binding.subscribe(listener);

      binding.dispose();
      employee.age = 40;

      expect(listener).not.toHaveBeenCalled();
      expect(employee.listenerCount('propertyChanged')).toBe(0);
    });

    it('알림이 없는 소스는 구독 무시', () => {
      const source = { age: 1 };
      const binding = new PropertyBinding({ source, path: 'age' });
      const listener = vi.fn();
      binding.subscribe(listener);

      source.age = 2;

      expect(listener).not.toHaveBeenCalled();
      expect(binding.getValue()).toBe(2);
    });
  });
});
