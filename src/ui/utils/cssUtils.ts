/**
 * CSS 유틸리티 함수
 *
 * 컬럼 너비, 정렬, 줄바꿈, 색상 등 CSS 값 처리를 위한 유틸리티입니다.
 */

import type { Color, ColumnWidth, LineBreakMode, TextAlignment } from '../../types';

/**
 * 숫자 또는 문자열을 CSS 값으로 변환
 *
 * @example
 * toCSSValue(150)      // '150px'
 * toCSSValue('20rem')  // '20rem'
 * toCSSValue(undefined) // undefined
 */
export function toCSSValue(value: number | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return `${value}px`;
  return value;
}

/**
 * 컬럼 너비를 CSS grid 트랙으로 변환
 *
 * @example
 * toGridTrack(120)    // '120px'
 * toGridTrack('*')    // '1fr'
 * toGridTrack('2.5*') // '2.5fr'
 * toGridTrack('auto') // 'auto'
 */
export function toGridTrack(width: ColumnWidth): string {
  if (typeof width === 'number') {
    return toCSSValue(Math.max(0, width)) ?? '0px';
  }
  if (width === 'auto') return 'auto';

  const weight = width === '*' ? 1 : Number(width.slice(0, -1));
  if (!Number.isFinite(weight) || weight < 0) {
    throw new Error(`[cssUtils] Invalid star width: "${width}"`);
  }
  return `${weight}fr`;
}

/**
 * 숨김 컬럼 트랙
 */
export const HIDDEN_TRACK = '0px';

const FLEX_ALIGNMENT: Record<TextAlignment, string> = {
  start: 'flex-start',
  center: 'center',
  end: 'flex-end',
};

/**
 * 가로/세로 정렬 적용 (flex 컨테이너 기준)
 */
export function applyTextAlignment(
  element: HTMLElement,
  horizontal: TextAlignment,
  vertical: TextAlignment
): void {
  element.style.textAlign = horizontal;
  element.style.justifyContent = FLEX_ALIGNMENT[horizontal];
  element.style.alignItems = FLEX_ALIGNMENT[vertical];
}

/**
 * 줄바꿈 모드 적용
 */
export function applyLineBreakMode(element: HTMLElement, mode: LineBreakMode): void {
  const { style } = element;
  style.direction = '';
  style.textOverflow = '';
  style.overflow = '';

  switch (mode) {
    case 'word-wrap':
      style.whiteSpace = 'normal';
      style.wordBreak = 'normal';
      break;
    case 'character-wrap':
      style.whiteSpace = 'normal';
      style.wordBreak = 'break-all';
      break;
    case 'head-truncation':
      // rtl 방향으로 앞부분 말줄임
      style.whiteSpace = 'nowrap';
      style.overflow = 'hidden';
      style.textOverflow = 'ellipsis';
      style.direction = 'rtl';
      break;
    case 'tail-truncation':
    case 'middle-truncation':
      style.whiteSpace = 'nowrap';
      style.overflow = 'hidden';
      style.textOverflow = 'ellipsis';
      break;
    case 'no-wrap':
    default:
      style.whiteSpace = 'nowrap';
      style.overflow = 'hidden';
  }
  element.dataset['lineBreakMode'] = mode;
}

/**
 * 글꼴 적용 (null이면 상속)
 */
export function applyFont(element: HTMLElement, fontSize: number, fontFamily: string | null): void {
  element.style.fontSize = toCSSValue(fontSize) ?? '';
  element.style.fontFamily = fontFamily ?? '';
}

/**
 * 색상 속성 적용 (null이면 제거)
 */
export function applyColor(
  element: HTMLElement,
  property: 'color' | 'backgroundColor' | 'accentColor',
  color: Color | null
): void {
  element.style[property] = color ?? '';
}
