/**
 * 숫자 입력 파서 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  NUMERIC_PARSERS,
  convertNumericText,
  isNumericDataType,
  trimTrailingSeparators,
} from '../../../src/ui/interaction/numericParsers';

describe('numericParsers', () => {
  describe('정수 타입', () => {
    it('int32 범위 검사', () => {
      const parse = NUMERIC_PARSERS.int32;
      expect(parse('123')).toBe(true);
      expect(parse(' 42 ')).toBe(true);
      expect(parse('-2147483648')).toBe(true);
      expect(parse('2147483648')).toBe(false);
      expect(parse('12a')).toBe(false);
      expect(parse('1.5')).toBe(false);
    });

    it('byte는 0..255', () => {
      expect(NUMERIC_PARSERS.byte('255')).toBe(true);
      expect(NUMERIC_PARSERS.byte('256')).toBe(false);
      expect(NUMERIC_PARSERS.byte('-1')).toBe(false);
    });

    it('uint64 최댓값', () => {
      expect(NUMERIC_PARSERS.uint64('18446744073709551615')).toBe(true);
      expect(NUMERIC_PARSERS.uint64('18446744073709551616')).toBe(false);
    });
  });

  describe('실수 타입', () => {
    it('끝의 구분자는 입력 중으로 간주', () => {
      expect(trimTrailingSeparators('12.,')).toBe('12');
      expect(NUMERIC_PARSERS.double('12.')).toBe(true);
      expect(NUMERIC_PARSERS.double('12.,')).toBe(true);
    });

    it('double은 천 단위 구분자와 지수 허용', () => {
      expect(NUMERIC_PARSERS.double('1,234.5')).toBe(true);
      expect(NUMERIC_PARSERS.double('1e5')).toBe(true);
      expect(NUMERIC_PARSERS.double('.')).toBe(false);
      expect(NUMERIC_PARSERS.double('-')).toBe(false);
      expect(NUMERIC_PARSERS.double('abc')).toBe(false);
    });

    it('decimal은 지수 불가, 범위 검사', () => {
      expect(NUMERIC_PARSERS.decimal('1e5')).toBe(false);
      expect(NUMERIC_PARSERS.decimal('79228162514264337593543950335')).toBe(true);
      expect(NUMERIC_PARSERS.decimal('79228162514264337593543950336')).toBe(false);
    });
  });

  describe('convertNumericText', () => {
    it('실수 변환', () => {
      expect(convertNumericText('1,234.5', 'double', 0)).toBe(1234.5);
      expect(convertNumericText('12.', 'decimal', 0)).toBe(12);
    });

    it('64비트 정수는 현재 값이 bigint면 bigint', () => {
      expect(convertNumericText('42', 'int64', 1n)).toBe(42n);
      expect(convertNumericText('42', 'int64', 1)).toBe(42);
    });

    it('안전한 정수 범위를 벗어나면 bigint', () => {
      expect(convertNumericText('9007199254740991', 'int64', 1)).toBe(9007199254740991);
      expect(convertNumericText('9007199254740993', 'int64', 1)).toBe(9007199254740993n);
      expect(convertNumericText('-9007199254740993', 'int64', null)).toBe(-9007199254740993n);
      expect(convertNumericText('18446744073709551615', 'uint64', 0)).toBe(18446744073709551615n);
    });

    it('빈 값이나 거부된 값은 undefined', () => {
      expect(convertNumericText('', 'int32', 1)).toBeUndefined();
      expect(convertNumericText('x', 'int32', 1)).toBeUndefined();
    });
  });

  it('isNumericDataType', () => {
    expect(isNumericDataType('int16')).toBe(true);
    expect(isNumericDataType('single')).toBe(true);
    expect(isNumericDataType('date')).toBe(false);
    expect(isNumericDataType('toString')).toBe(false);
  });
});
