/**
 * 컬럼 관련 타입 정의
 *
 * 컬럼 정의, 셀 템플릿, 정렬/줄바꿈 옵션 등 행 렌더링에 필요한 타입입니다.
 */

import type { PropertyBinding } from '../core/binding/PropertyBinding';
import type { DataGridColumn } from '../ui/column/DataGridColumn';

// ============================================================================
// 기본 타입
// ============================================================================

/**
 * CSS 색상 문자열 (예: '#ffffff', 'rgb(128, 144, 160)')
 */
export type Color = string;

/**
 * 컬럼 데이터 타입
 *
 * 편집 모드에서 기본 에디터를 고르는 기준입니다.
 */
export type DataType =
  | 'string'
  | 'boolean'
  | 'decimal'
  | 'double'
  | 'single'
  | 'byte'
  | 'sbyte'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'date'
  | 'object';

/**
 * 실수 타입 (끝의 ',' '.' 허용)
 */
export type FloatingDataType = 'decimal' | 'double' | 'single';

/**
 * 정수 타입
 */
export type IntegerDataType =
  | 'byte'
  | 'sbyte'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint16'
  | 'uint32'
  | 'uint64';

/**
 * 숫자 타입
 */
export type NumericDataType = FloatingDataType | IntegerDataType;

/**
 * 컬럼 너비
 *
 * - number: 픽셀
 * - 'auto': 내용에 맞춤
 * - '*', '2*': 남은 공간 비율
 */
export type ColumnWidth = number | 'auto' | '*' | `${number}*`;

/**
 * 가로 정렬
 */
export type TextAlignment = 'start' | 'center' | 'end';

/**
 * 줄바꿈/말줄임 모드
 */
export type LineBreakMode =
  | 'no-wrap'
  | 'word-wrap'
  | 'character-wrap'
  | 'head-truncation'
  | 'tail-truncation'
  | 'middle-truncation';

// ============================================================================
// 셀 템플릿
// ============================================================================

/**
 * 셀 템플릿 컨텍스트
 */
export interface CellTemplateContext<T = unknown> {
  /** 행에 바인딩된 데이터 항목 */
  item: T | null;
  /** 컬럼 정의 */
  column: DataGridColumn;
  /** 바인딩 컨텍스트 (propertyName이 없으면 item 자체) */
  value: unknown;
  /** 속성 바인딩 (propertyName이 없으면 null) */
  binding: PropertyBinding | null;
}

/**
 * 셀 템플릿 함수
 *
 * 셀마다 새 요소를 만들어 반환해야 합니다.
 */
export type CellTemplate<T = unknown> = (context: CellTemplateContext<T>) => HTMLElement;
