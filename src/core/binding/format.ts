/**
 * 문자열 포맷
 *
 * 컬럼의 stringFormat을 적용합니다. 형식은 복합 서식 문자열입니다.
 * - '{0}', '{0:N2}' 자리 표시자, '{{' '}}' 이스케이프
 * - 숫자 표준 서식: N, F, P, D, X, C, E (+ 자릿수)
 * - 숫자 사용자 서식: '#,##0.00', '0.0'
 * - 날짜 서식: 'yyyy-MM-dd HH:mm', 'd' (M/d/yyyy)
 *
 * @example
 * formatValue(1234.5, '{0:N2}')        // '1,234.50'
 * formatValue(0.125, '{0:P1}')         // '12.5 %'
 * formatValue(date, '{0:yyyy-MM-dd}')  // '2024-03-09'
 * formatValue(42, 'Total: {0}')        // 'Total: 42'
 */

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{0(?::([^}]*))?\}/g;
const STANDARD_NUMERIC_PATTERN = /^([NnFfPpDdXxCcEe])(\d{0,2})$/;
const CUSTOM_NUMERIC_PATTERN = /^[#0,]*(\.[#0]*)?$/;
const DATE_TOKEN_PATTERN = /yyyy|yy|MM|M|dd|d|HH|H|hh|h|mm|m|ss|s|tt|fff|'[^']*'/g;

/**
 * 값을 문자열로 포맷
 */
export function formatValue(value: unknown, stringFormat?: string | null): string {
  if (value === null || value === undefined) return '';
  if (!stringFormat) return toDisplayString(value);

  return stringFormat.replace(PLACEHOLDER_PATTERN, (match: string, specifier: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    return formatWithSpecifier(value, specifier);
  });
}

/**
 * 서식 없는 기본 문자열 변환
 */
export function toDisplayString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toLocaleString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function formatWithSpecifier(value: unknown, specifier: string | undefined): string {
  if (!specifier) return toDisplayString(value);

  if (typeof value === 'number' || typeof value === 'bigint') {
    return formatNumber(value, specifier);
  }
  if (value instanceof Date) {
    return formatDate(value, specifier);
  }
  // 문자열/불리언은 서식을 무시
  return toDisplayString(value);
}

// ============================================================================
// 숫자
// ============================================================================

function formatNumber(value: number | bigint, specifier: string): string {
  const standard = STANDARD_NUMERIC_PATTERN.exec(specifier);
  if (standard) {
    const [, letter = '', digits = ''] = standard;
    const precision = digits === '' ? null : Number(digits);
    return formatStandardNumber(value, letter, precision);
  }

  if (CUSTOM_NUMERIC_PATTERN.test(specifier)) {
    return formatCustomNumber(Number(value), specifier);
  }

  return toDisplayString(value);
}

function formatStandardNumber(value: number | bigint, letter: string, precision: number | null): string {
  const numeric = Number(value);

  switch (letter.toUpperCase()) {
    case 'N':
      return toGrouped(numeric, precision ?? 2);
    case 'F':
      return numeric.toFixed(precision ?? 2);
    case 'P':
      return `${(numeric * 100).toFixed(precision ?? 2)} %`;
    case 'C': {
      const text = `$${toGrouped(Math.abs(numeric), precision ?? 2)}`;
      return numeric < 0 ? `-${text}` : text;
    }
    case 'E':
      return toExponential(numeric, precision ?? 6, letter);
    case 'D':
      return toPaddedInteger(value, precision ?? 0);
    case 'X':
      return toHex(value, precision ?? 0, letter === 'X');
    default:
      return toDisplayString(value);
  }
}

function toGrouped(value: number, fractionDigits: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

function toExponential(value: number, fractionDigits: number, letter: string): string {
  const [mantissa = '', exponent = '0'] = value.toExponential(fractionDigits).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const magnitude = exponent.replace(/^[+-]/, '').padStart(3, '0');
  return `${mantissa}${letter}${sign}${magnitude}`;
}

function toPaddedInteger(value: number | bigint, width: number): string {
  if (typeof value === 'number' && !Number.isInteger(value)) return String(value);
  const integer = BigInt(value);
  const negative = integer < 0n;
  const digits = (negative ? -integer : integer).toString().padStart(width, '0');
  return negative ? `-${digits}` : digits;
}

function toHex(value: number | bigint, width: number, upper: boolean): string {
  if (typeof value === 'number' && !Number.isInteger(value)) return String(value);
  let integer = BigInt(value);
  if (integer < 0n) {
    // 음수는 64비트 2의 보수
    integer = BigInt.asUintN(64, integer);
  }
  const hex = integer.toString(16).padStart(width, '0');
  return upper ? hex.toUpperCase() : hex;
}

function formatCustomNumber(value: number, specifier: string): string {
  const [integerPart = '', fractionPart = ''] = specifier.split('.');
  const minimumIntegerDigits = Math.max(1, (integerPart.match(/0/g) ?? []).length);

  return value.toLocaleString('en-US', {
    useGrouping: integerPart.includes(','),
    minimumIntegerDigits: Math.min(minimumIntegerDigits, 21),
    minimumFractionDigits: (fractionPart.match(/0/g) ?? []).length,
    maximumFractionDigits: fractionPart.length,
  });
}

// ============================================================================
// 날짜
// ============================================================================

function formatDate(date: Date, specifier: string): string {
  if (Number.isNaN(date.getTime())) return '';

  const pattern = specifier === 'd' ? 'M/d/yyyy' : specifier;
  return pattern.replace(DATE_TOKEN_PATTERN, (token) => formatDateToken(date, token));
}

function formatDateToken(date: Date, token: string): string {
  const hours = date.getHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;

  switch (token) {
    case 'yyyy':
      return String(date.getFullYear()).padStart(4, '0');
    case 'yy':
      return String(date.getFullYear() % 100).padStart(2, '0');
    case 'MM':
      return pad2(date.getMonth() + 1);
    case 'M':
      return String(date.getMonth() + 1);
    case 'dd':
      return pad2(date.getDate());
    case 'd':
      return String(date.getDate());
    case 'HH':
      return pad2(hours);
    case 'H':
      return String(hours);
    case 'hh':
      return pad2(hours12);
    case 'h':
      return String(hours12);
    case 'mm':
      return pad2(date.getMinutes());
    case 'm':
      return String(date.getMinutes());
    case 'ss':
      return pad2(date.getSeconds());
    case 's':
      return String(date.getSeconds());
    case 'tt':
      return hours < 12 ? 'AM' : 'PM';
    case 'fff':
      return String(date.getMilliseconds()).padStart(3, '0');
    default:
      // 따옴표 리터럴
      return token.slice(1, -1);
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
