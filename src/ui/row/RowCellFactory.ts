/**
 * RowCellFactory - 셀 내용 생성
 *
 * DataGridRow에서 분리된 셀 내용 생성 로직입니다.
 * - 표시 모드: cellTemplate 또는 라벨
 * - 편집 모드: editCellTemplate 또는 데이터 타입별 기본 에디터
 *
 * DataGridRow = 언제 (어떤 셀을 교체/제거할지)
 * RowCellFactory = 무엇을 (셀 안에 어떤 요소를 넣을지)
 */

import type { CellTemplate } from '../../types';
import type { CellContent } from '../cell/types';
import { createColumnBinding, createDefaultEditor } from '../interaction/EditorFactory';
import type { EditorContext } from '../interaction/EditorFactory';
import { applyColor, applyFont, applyLineBreakMode, applyTextAlignment } from '../utils/cssUtils';

/**
 * 셀 내용 생성기
 */
export class RowCellFactory {
  /**
   * 표시 셀 내용 생성
   */
  createViewContent(context: EditorContext): CellContent {
    const { column } = context;
    if (column.cellTemplate) {
      return this.createTemplatedContent(column.cellTemplate, context, false);
    }
    return this.createLabel(context);
  }

  /**
   * 편집 셀 내용 생성
   */
  createEditContent(context: EditorContext): CellContent {
    const { column } = context;
    if (column.editCellTemplate) {
      return this.createTemplatedContent(column.editCellTemplate, context, true);
    }
    return createDefaultEditor(context);
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  /**
   * 라벨 생성
   */
  private createLabel(context: EditorContext): CellContent {
    const { column } = context;

    const label = document.createElement('div');
    label.className = 'dg-cell-label';
    label.style.display = 'flex';
    applyColor(label, 'color', context.textColor);
    applyTextAlignment(label, column.horizontalTextAlignment, column.verticalTextAlignment);
    applyLineBreakMode(label, column.lineBreakMode);
    applyFont(label, context.fontSize, context.fontFamily);

    const binding = createColumnBinding(column, context.item, 'one-way', column.stringFormat);
    if (!binding) {
      return { kind: 'label', element: label, dispose: () => {} };
    }

    const render = (): void => {
      const text = binding.getDisplayText();
      label.textContent = text;
      label.title = text; // 툴팁
    };
    render();
    binding.subscribe(render);

    return { kind: 'label', element: label, dispose: () => binding.dispose() };
  }

  /**
   * 템플릿 셀 생성
   *
   * propertyName이 있으면 속성 값이, 없으면 항목 자체가 템플릿의 value가 됩니다.
   */
  private createTemplatedContent(template: CellTemplate, context: EditorContext, editing: boolean): CellContent {
    const { column, item } = context;
    const binding = createColumnBinding(column, item, editing ? 'two-way' : 'one-way');

    const element = template({
      item,
      column,
      value: binding ? binding.getValue() : item,
      binding,
    });
    element.classList.add('dg-cell-template');

    return { kind: 'template', element, dispose: () => binding?.dispose() };
  }
}
