/**
 * 숫자 입력 파서
 *
 * 숫자 에디터가 입력 텍스트를 받아들일지 판단합니다.
 * 실수 타입은 입력 중인 값('12.', '1,')을 허용하기 위해 끝의 ',' '.'을 제거한 뒤 검사합니다.
 * 정수 타입은 BigInt로 정확한 범위를 검사합니다.
 */

import type { FloatingDataType, IntegerDataType, NumericDataType } from '../../types';

/**
 * 텍스트 수용 여부 판단 함수
 */
export type TextParser = (text: string) => boolean;

// 부호, 천 단위 구분자(,), 소수점 허용
const DECIMAL_PATTERN = /^[+-]?(\d[\d,]*(\.\d*)?|\.\d+)$/;
// + 지수
const FLOAT_PATTERN = /^[+-]?(\d[\d,]*(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const DECIMAL_MAX = 79228162514264337593543950335n;

/**
 * 정수 타입별 범위
 */
export const INTEGER_RANGES: Record<IntegerDataType, readonly [bigint, bigint]> = {
  byte: [0n, 255n],
  sbyte: [-128n, 127n],
  int16: [-32768n, 32767n],
  int32: [-2147483648n, 2147483647n],
  int64: [-9223372036854775808n, 9223372036854775807n],
  uint16: [0n, 65535n],
  uint32: [0n, 4294967295n],
  uint64: [0n, 18446744073709551615n],
};

const FLOATING_TYPES: readonly FloatingDataType[] = ['decimal', 'double', 'single'];

/**
 * 숫자 타입 여부
 */
export function isNumericDataType(dataType: string): dataType is NumericDataType {
  return isFloatingDataType(dataType) || Object.hasOwn(INTEGER_RANGES, dataType);
}

/**
 * 실수 타입 여부
 */
export function isFloatingDataType(dataType: string): dataType is FloatingDataType {
  return FLOATING_TYPES.some((type) => type === dataType);
}

/**
 * 끝의 ',' '.' 제거
 */
export function trimTrailingSeparators(text: string): string {
  return text.replace(/[,.]+$/, '');
}

function parseDecimalDigits(text: string): bigint {
  const [integerPart = ''] = text.replace(/^[+-]/, '').replace(/,/g, '').split('.');
  return integerPart === '' ? 0n : BigInt(integerPart);
}

function acceptsDecimal(text: string): boolean {
  const trimmed = trimTrailingSeparators(text).trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return false;
  return parseDecimalDigits(trimmed) <= DECIMAL_MAX;
}

function acceptsFloat(text: string): boolean {
  return FLOAT_PATTERN.test(trimTrailingSeparators(text).trim());
}

function createIntegerParser(dataType: IntegerDataType): TextParser {
  const [min, max] = INTEGER_RANGES[dataType];
  return (text) => {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return false;
    const value = BigInt(trimmed);
    return value >= min && value <= max;
  };
}

/**
 * 데이터 타입별 파서 테이블
 */
export const NUMERIC_PARSERS: Record<NumericDataType, TextParser> = {
  decimal: acceptsDecimal,
  double: acceptsFloat,
  single: acceptsFloat,
  byte: createIntegerParser('byte'),
  sbyte: createIntegerParser('sbyte'),
  int16: createIntegerParser('int16'),
  int32: createIntegerParser('int32'),
  int64: createIntegerParser('int64'),
  uint16: createIntegerParser('uint16'),
  uint32: createIntegerParser('uint32'),
  uint64: createIntegerParser('uint64'),
};

function isSafeInteger(value: bigint): boolean {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER);
}

/**
 * 입력 텍스트를 소스에 쓸 값으로 변환
 *
 * 정수는 현재 값이 bigint이거나 안전한 정수 범위를 벗어나면 bigint로 씁니다.
 *
 * @returns 변환 값 (빈 값이거나 파서가 거부하면 undefined)
 */
export function convertNumericText(
  text: string,
  dataType: NumericDataType,
  current: unknown
): number | bigint | undefined {
  if (text.trim() === '' || !NUMERIC_PARSERS[dataType](text)) return undefined;

  if (isFloatingDataType(dataType)) {
    const normalized = trimTrailingSeparators(text).trim().replace(/,/g, '');
    const value = Number(normalized);
    return Number.isNaN(value) ? undefined : value;
  }

  const integer = BigInt(text.trim());
  if (typeof current === 'bigint' || !isSafeInteger(integer)) return integer;
  return Number(integer);
}
