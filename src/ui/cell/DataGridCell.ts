/**
 * DataGridCell - 셀 래퍼
 *
 * 셀 내용(라벨, 에디터, 템플릿)을 감싸고 색상과 테두리를 관리합니다.
 * 셀 요소의 배경은 그리드 테두리 색이고, 오른쪽/아래 padding이 테두리 두께입니다.
 * 내용 요소가 행 배경색을 가지므로 padding 영역이 테두리처럼 보입니다.
 */

import { PropertyBinding } from '../../core/binding/PropertyBinding';
import type { Color, Unsubscribe } from '../../types';
import type { PropertyChangeSource } from '../../core/ObservableObject';
import type { DataGridColumn } from '../column/DataGridColumn';
import { applyColor, toCSSValue } from '../utils/cssUtils';
import type { CellContent } from './types';

/**
 * 셀이 바인딩하는 그리드 속성
 */
export interface CellBorderSource extends PropertyChangeSource {
  readonly borderColor: Color;
  readonly borderThickness: number;
}

/**
 * 셀 래퍼
 */
export class DataGridCell<T = unknown> {
  /** 셀 요소 */
  readonly element: HTMLDivElement;
  /** 컬럼 정의 */
  readonly column: DataGridColumn;
  /** 편집 셀 여부 */
  readonly isEditing: boolean;
  /** 생성 시점의 행 데이터 항목 */
  readonly item: T | null;

  private readonly content: CellContent;
  private backgroundColor: Color | null;
  private textColor: Color | null;
  private borderBindings: PropertyBinding[] = [];
  private borderSubscriptions: Unsubscribe[] = [];

  constructor(
    content: CellContent,
    backgroundColor: Color | null,
    textColor: Color | null,
    column: DataGridColumn,
    isEditing: boolean,
    item: T | null
  ) {
    this.content = content;
    this.backgroundColor = backgroundColor;
    this.textColor = textColor;
    this.column = column;
    this.isEditing = isEditing;
    this.item = item;

    this.element = document.createElement('div');
    this.element.className = isEditing ? 'dg-cell dg-cell-editing' : 'dg-cell';
    this.element.setAttribute('role', 'gridcell');
    this.element.appendChild(content.element);

    applyColor(content.element, 'backgroundColor', backgroundColor);
  }

  // ===========================================================================
  // 공개 API
  // ===========================================================================

  /**
   * 셀 내용
   */
  getContent(): CellContent {
    return this.content;
  }

  getBackgroundColor(): Color | null {
    return this.backgroundColor;
  }

  getTextColor(): Color | null {
    return this.textColor;
  }

  /**
   * grid 컬럼 위치 지정 (0부터)
   */
  setColumnIndex(columnIndex: number): void {
    this.element.style.gridColumn = String(columnIndex + 1);
    this.element.dataset['columnIndex'] = String(columnIndex);
  }

  /**
   * 그리드 테두리 속성 바인딩
   *
   * 다시 호출하면 이전 바인딩을 해제합니다.
   */
  updateBindings(source: CellBorderSource): void {
    this.releaseBorderBindings();

    const colorBinding = new PropertyBinding({ source, path: 'borderColor' });
    const thicknessBinding = new PropertyBinding({ source, path: 'borderThickness' });

    const applyBorderColor = (): void => {
      const color = colorBinding.getValue();
      applyColor(this.element, 'backgroundColor', typeof color === 'string' ? color : null);
    };
    const applyBorderThickness = (): void => {
      const thickness = thicknessBinding.getValue();
      const size = toCSSValue(typeof thickness === 'number' ? thickness : 0) ?? '0px';
      this.element.style.padding = `0px ${size} ${size} 0px`;
    };

    applyBorderColor();
    applyBorderThickness();

    this.borderBindings = [colorBinding, thicknessBinding];
    this.borderSubscriptions = [
      colorBinding.subscribe(applyBorderColor),
      thicknessBinding.subscribe(applyBorderThickness),
    ];
  }

  /**
   * 색상 갱신
   *
   * 글자색은 지정된 경우에만 바꿉니다.
   */
  updateCellColors(backgroundColor: Color | null, textColor?: Color | null): void {
    this.backgroundColor = backgroundColor;
    const { element, kind } = this.content;
    applyColor(element, 'backgroundColor', backgroundColor);

    if (textColor === undefined) return;
    this.textColor = textColor;

    switch (kind) {
      case 'label':
      case 'text':
      case 'numeric':
      case 'date':
        applyColor(element, 'color', textColor);
        break;
      case 'checkbox':
        applyColor(element, 'accentColor', textColor);
        break;
      case 'template':
      case 'empty':
        break;
    }
  }

  /**
   * 리소스 해제
   */
  dispose(): void {
    this.releaseBorderBindings();
    this.content.dispose();
    this.element.remove();
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private releaseBorderBindings(): void {
    for (const unsubscribe of this.borderSubscriptions) {
      unsubscribe();
    }
    for (const binding of this.borderBindings) {
      binding.dispose();
    }
    this.borderSubscriptions = [];
    this.borderBindings = [];
  }
}
