/**
 * DataGridCell 테스트
 */

import { describe, it, expect, vi } from 'vitest';
import { DataGridCell } from '../../../src/ui/cell/DataGridCell';
import type { CellContent, CellContentKind } from '../../../src/ui/cell/types';
import { DataGridColumn } from '../../../src/ui/column/DataGridColumn';
import { DataGrid } from '../../../src/ui/DataGrid';

function createContent(kind: CellContentKind): CellContent & { dispose: ReturnType<typeof vi.fn> } {
  return { kind, element: document.createElement('div'), dispose: vi.fn() };
}

describe('DataGridCell', () => {
  it('요소 구조', () => {
    const content = createContent('label');
    const cell = new DataGridCell(content, 'white', 'black', new DataGridColumn(), false, null);

    expect(cell.element.className).toBe('dg-cell');
    expect(cell.element.getAttribute('role')).toBe('gridcell');
    expect(cell.element.firstElementChild).toBe(content.element);
    expect(content.element.style.backgroundColor).toBe('white');
  });

  it('편집 셀 클래스', () => {
    const cell = new DataGridCell(createContent('text'), null, null, new DataGridColumn(), true, null);
    expect(cell.element.className).toBe('dg-cell dg-cell-editing');
  });

  it('setColumnIndex', () => {
    const cell = new DataGridCell(createContent('label'), null, null, new DataGridColumn(), false, null);
    cell.setColumnIndex(2);
    expect(cell.element.dataset['columnIndex']).toBe('2');
  });

  describe('updateCellColors', () => {
    it('라벨은 배경과 글자색', () => {
      const content = createContent('label');
      const cell = new DataGridCell(content, 'white', 'black', new DataGridColumn(), false, null);

      cell.updateCellColors('teal', 'navy');

      expect(cell.getBackgroundColor()).toBe('teal');
      expect(cell.getTextColor()).toBe('navy');
      expect(content.element.style.backgroundColor).toBe('teal');
      expect(content.element.style.color).toBe('navy');
    });

    it('글자색 생략 시 유지', () => {
      const content = createContent('label');
      const cell = new DataGridCell(content, 'white', 'black', new DataGridColumn(), false, null);

      cell.updateCellColors('teal');

      expect(cell.getTextColor()).toBe('black');
    });

    it('템플릿은 배경만', () => {
      const content = createContent('template');
      const cell = new DataGridCell(content, 'white', null, new DataGridColumn(), false, null);

      cell.updateCellColors('teal', 'navy');

      expect(content.element.style.backgroundColor).toBe('teal');
      expect(content.element.style.color).toBe('');
    });

    it('체크박스는 글자색 대신 accent', () => {
      const content = createContent('checkbox');
      const cell = new DataGridCell(content, 'white', null, new DataGridColumn(), true, null);

      cell.updateCellColors('teal', 'navy');

      expect(content.element.style.color).toBe('');
      expect(cell.getTextColor()).toBe('navy');
    });
  });

  describe('테두리 바인딩', () => {
    it('그리드 테두리 색과 두께 반영', () => {
      const grid = new DataGrid({ borderColor: 'red', borderThickness: 2 });
      const cell = new DataGridCell(createContent('label'), 'white', null, new DataGridColumn(), false, null);

      cell.updateBindings(grid);

      expect(cell.element.style.backgroundColor).toBe('red');
      expect(cell.element.style.paddingRight).toBe('2px');
      expect(cell.element.style.paddingBottom).toBe('2px');

      grid.borderColor = 'blue';
      grid.borderThickness = 3;

      expect(cell.element.style.backgroundColor).toBe('blue');
      expect(cell.element.style.paddingRight).toBe('3px');
    });

    it('다시 바인딩하면 이전 구독 해제', () => {
      const grid = new DataGrid();
      const cell = new DataGridCell(createContent('label'), null, null, new DataGridColumn(), false, null);

      cell.updateBindings(grid);
      cell.updateBindings(grid);

      expect(grid.listenerCount('propertyChanged')).toBe(2);
    });
  });

  it('dispose()는 내용 해제, 요소 제거, 구독 해제', () => {
    const grid = new DataGrid();
    const parent = document.createElement('div');
    const content = createContent('label');
    const cell = new DataGridCell(content, null, null, new DataGridColumn(), false, null);
    cell.updateBindings(grid);
    parent.appendChild(cell.element);

    cell.dispose();

    expect(content.dispose).toHaveBeenCalledTimes(1);
    expect(parent.childElementCount).toBe(0);
    expect(grid.listenerCount('propertyChanged')).toBe(0);
  });
});
