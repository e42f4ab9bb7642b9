/**
 * EditorFactory - 기본 셀 에디터 생성
 *
 * 컬럼의 dataType에 따라 편집 모드 에디터를 만듭니다.
 * - string: 텍스트 입력 (stringFormat 적용)
 * - boolean: 체크박스
 * - 숫자 타입: 숫자 입력 (파서가 거부하면 이전 값으로 되돌림)
 * - date: 날짜 선택
 * - 그 외: 빈 요소
 *
 * 모든 에디터는 컬럼에 propertyName이 있을 때만 two-way 바인딩합니다.
 */

import { PropertyBinding } from '../../core/binding/PropertyBinding';
import type { BindingMode } from '../../core/binding/PropertyBinding';
import { isBlankPath } from '../../core/binding/propertyPath';
import { toDisplayString } from '../../core/binding/format';
import type { DataType, NumericDataType } from '../../types';
import type { DataGridColumn } from '../column/DataGridColumn';
import type { CellContent, CellStyleContext } from '../cell/types';
import { applyColor, applyFont, applyTextAlignment } from '../utils/cssUtils';
import { NUMERIC_PARSERS, convertNumericText, isFloatingDataType } from './numericParsers';

/**
 * 에디터 생성 컨텍스트
 */
export interface EditorContext extends CellStyleContext {
  /** 컬럼 정의 */
  column: DataGridColumn;
  /** 행 데이터 항목 */
  item: unknown;
}

/**
 * 에디터 생성 함수
 */
export type EditorConstructor = (context: EditorContext) => CellContent;

/**
 * 컬럼 바인딩 생성 (propertyName이 없으면 null)
 */
export function createColumnBinding(
  column: DataGridColumn,
  item: unknown,
  mode: BindingMode,
  stringFormat: string | null = null
): PropertyBinding | null {
  if (isBlankPath(column.propertyName)) return null;
  return new PropertyBinding({ source: item, path: column.propertyName, mode, stringFormat });
}

/**
 * 기본 에디터 생성
 */
export function createDefaultEditor(context: EditorContext): CellContent {
  return DEFAULT_EDITORS[context.column.dataType](context);
}

// ===========================================================================
// 에디터
// ===========================================================================

/**
 * 텍스트 에디터
 */
function createTextEditor(context: EditorContext): CellContent {
  const { column } = context;
  const input = createInput('text', 'dg-editor dg-editor-text', context);

  const binding = createColumnBinding(column, context.item, 'two-way', column.stringFormat);
  if (!binding) {
    return { kind: 'text', element: input, dispose: () => {} };
  }

  input.value = binding.getDisplayText();

  // 이 에디터가 쓴 값은 입력란에 다시 포맷해 넣지 않음
  let writing = false;
  const handleInput = (): void => {
    writing = true;
    try {
      binding.setValue(input.value);
    } finally {
      writing = false;
    }
  };
  input.addEventListener('input', handleInput);

  binding.subscribe(() => {
    if (writing) return;
    const text = binding.getDisplayText();
    if (input.value !== text) {
      input.value = text;
    }
  });

  return {
    kind: 'text',
    element: input,
    dispose: () => {
      input.removeEventListener('input', handleInput);
      binding.dispose();
    },
  };
}

/**
 * 체크박스 에디터
 */
function createBooleanEditor(context: EditorContext): CellContent {
  const input = document.createElement('input');
  input.type = 'checkbox';
  input.className = 'dg-editor dg-editor-checkbox';
  applyColor(input, 'accentColor', context.textColor);
  applyColor(input, 'backgroundColor', context.backgroundColor);

  const binding = createColumnBinding(context.column, context.item, 'two-way');
  if (!binding) {
    return { kind: 'checkbox', element: input, dispose: () => {} };
  }

  input.checked = binding.getValue() === true;

  const handleChange = (): void => {
    binding.setValue(input.checked);
  };
  input.addEventListener('change', handleChange);

  binding.subscribe((value) => {
    input.checked = value === true;
  });

  return {
    kind: 'checkbox',
    element: input,
    dispose: () => {
      input.removeEventListener('change', handleChange);
      binding.dispose();
    },
  };
}

/**
 * 숫자 에디터 생성 함수 (데이터 타입별)
 */
function numericEditor(dataType: NumericDataType): EditorConstructor {
  const parser = NUMERIC_PARSERS[dataType];

  return (context) => {
    const input = createInput('text', 'dg-editor dg-editor-numeric', context);
    input.setAttribute('inputmode', isFloatingDataType(dataType) ? 'decimal' : 'numeric');
    input.dataset['dataType'] = dataType;

    const binding = createColumnBinding(context.column, context.item, 'two-way');
    let lastText = binding ? toDisplayString(binding.getValue()) : '';
    input.value = lastText;

    const handleInput = (): void => {
      const text = input.value;
      if (text !== '' && !parser(text)) {
        // 거부된 입력은 이전 텍스트로 되돌림
        input.value = lastText;
        return;
      }
      lastText = text;

      if (!binding) return;
      const converted = convertNumericText(text, dataType, binding.getValue());
      if (converted !== undefined) {
        binding.setValue(converted);
      }
    };
    input.addEventListener('input', handleInput);

    binding?.subscribe((value) => {
      // 입력 중인 '12.' 같은 텍스트는 같은 값이면 유지
      const typed = convertNumericText(input.value, dataType, value);
      if (typed !== undefined && String(typed) === String(value)) return;

      lastText = toDisplayString(value);
      input.value = lastText;
    });

    return {
      kind: 'numeric',
      element: input,
      dispose: () => {
        input.removeEventListener('input', handleInput);
        binding?.dispose();
      },
    };
  };
}

/**
 * 날짜 에디터
 */
function createDateEditor(context: EditorContext): CellContent {
  const input = document.createElement('input');
  input.type = 'date';
  input.className = 'dg-editor dg-editor-date';
  applyColor(input, 'color', context.textColor);

  const binding = createColumnBinding(context.column, context.item, 'two-way');
  if (!binding) {
    return { kind: 'date', element: input, dispose: () => {} };
  }

  input.value = toDateInputValue(binding.getValue());

  const handleChange = (): void => {
    const date = parseDateInputValue(input.value);
    if (!date) return;
    // 소스가 문자열이면 'YYYY-MM-DD' 문자열로 유지
    binding.setValue(typeof binding.getValue() === 'string' ? input.value : date);
  };
  input.addEventListener('change', handleChange);

  binding.subscribe((value) => {
    const text = toDateInputValue(value);
    if (input.value !== text) {
      input.value = text;
    }
  });

  return {
    kind: 'date',
    element: input,
    dispose: () => {
      input.removeEventListener('change', handleChange);
      binding.dispose();
    },
  };
}

/**
 * 지원하지 않는 타입용 빈 에디터
 */
function createEmptyEditor(): CellContent {
  const element = document.createElement('div');
  element.className = 'dg-editor dg-editor-empty';
  return { kind: 'empty', element, dispose: () => {} };
}

/**
 * 데이터 타입별 기본 에디터 테이블
 */
export const DEFAULT_EDITORS: Record<DataType, EditorConstructor> = {
  string: createTextEditor,
  boolean: createBooleanEditor,
  decimal: numericEditor('decimal'),
  double: numericEditor('double'),
  single: numericEditor('single'),
  byte: numericEditor('byte'),
  sbyte: numericEditor('sbyte'),
  int16: numericEditor('int16'),
  int32: numericEditor('int32'),
  int64: numericEditor('int64'),
  uint16: numericEditor('uint16'),
  uint32: numericEditor('uint32'),
  uint64: numericEditor('uint64'),
  date: createDateEditor,
  object: createEmptyEditor,
};

// ===========================================================================
// 헬퍼
// ===========================================================================

function createInput(type: string, className: string, context: EditorContext): HTMLInputElement {
  const { column } = context;
  const input = document.createElement('input');
  input.type = type;
  input.className = className;
  applyColor(input, 'color', context.textColor);
  applyTextAlignment(input, column.horizontalTextAlignment, column.verticalTextAlignment);
  applyFont(input, context.fontSize, context.fontFamily);
  return input;
}

function pad(value: number, length: number): string {
  return String(value).padStart(length, '0');
}

/**
 * 값을 date input 값('YYYY-MM-DD')으로 변환
 */
export function toDateInputValue(value: unknown): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return '';
    return `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1, 2)}-${pad(value.getDate(), 2)}`;
  }
  if (typeof value === 'string') {
    const match = /^\d{4}-\d{2}-\d{2}/.exec(value);
    return match ? match[0] : '';
  }
  return '';
}

/**
 * date input 값을 로컬 자정 Date로 변환
 *
 * @returns 형식이 맞지 않거나 존재하지 않는 날짜면 null
 */
export function parseDateInputValue(text: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}
