/**
 * 그리드 관련 타입 정의
 */

import type { Color } from './column.types';
import type { ColorProvider } from '../ui/palette/PaletteCollection';
import type { DataGridColumn } from '../ui/column/DataGridColumn';

/**
 * 선택 모드
 */
export type SelectionMode = 'none' | 'single' | 'multiple';

/**
 * 구독 해제 함수
 */
export type Unsubscribe = () => void;

/**
 * 속성 변경 이벤트 페이로드
 */
export interface PropertyChangedPayload {
  /** 변경된 속성 이름 */
  propertyName: string;
  /** 이전 값 */
  oldValue: unknown;
  /** 새 값 */
  newValue: unknown;
}

/**
 * 선택 변경 이벤트 페이로드
 */
export interface SelectionChangedPayload<T = unknown> {
  /** 변경 전 선택 */
  previousSelection: readonly T[];
  /** 변경 후 선택 */
  currentSelection: readonly T[];
}

/**
 * DataGrid 초기화 옵션
 */
export interface DataGridOptions<T = unknown> {
  /** 컬럼 정의 */
  columns?: DataGridColumn[];

  /** 초기 데이터 */
  items?: T[];

  /** 선택 모드 @default 'single' */
  selectionMode?: SelectionMode;

  /** 선택된 행 배경색 @default 'rgb(128, 144, 160)' */
  activeRowColor?: Color;

  /** 행 배경색 팔레트 @default ['#ffffff'] */
  rowsBackgroundColorPalette?: ColorProvider;

  /** 행 글자색 팔레트 @default ['#000000'] */
  rowsTextColorPalette?: ColorProvider;

  /** 글자 크기 (px) @default 13 */
  fontSize?: number;

  /** 글꼴 (null이면 상속) @default null */
  fontFamily?: string | null;

  /** 테두리 색상 @default '#000000' */
  borderColor?: Color;

  /** 테두리 두께 (px) @default 1 */
  borderThickness?: number;
}
