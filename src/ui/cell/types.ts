/**
 * 셀 내용 타입 정의
 */

import type { Color } from '../../types';

/**
 * 셀 내용 종류
 *
 * 색상 적용 방식을 결정합니다.
 * - label, text, numeric, date: 글자색 적용
 * - checkbox: accent-color 적용
 * - template, empty: 배경색만 적용
 */
export type CellContentKind = 'label' | 'template' | 'text' | 'numeric' | 'checkbox' | 'date' | 'empty';

/**
 * 셀 내용
 */
export interface CellContent {
  /** 내용 종류 */
  readonly kind: CellContentKind;
  /** 내용 요소 */
  readonly element: HTMLElement;
  /** 바인딩/리스너 해제 */
  dispose(): void;
}

/**
 * 셀 내용 생성 컨텍스트 (행의 현재 색상/글꼴)
 */
export interface CellStyleContext {
  backgroundColor: Color | null;
  textColor: Color | null;
  fontSize: number;
  fontFamily: string | null;
}
