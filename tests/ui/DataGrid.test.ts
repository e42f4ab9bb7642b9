/**
 * DataGrid 테스트
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DataGrid } from '../../src/ui/DataGrid';
import { Employee, createColumns, createEmployees } from '../fixtures/employees';

describe('DataGrid', () => {
  let employees: [Employee, Employee, Employee];
  let grid: DataGrid<Employee>;

  beforeEach(() => {
    employees = createEmployees();
    grid = new DataGrid<Employee>({ columns: createColumns(), items: employees });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('기본 옵션', () => {
    const defaults = new DataGrid();

    expect(defaults.selectionMode).toBe('single');
    expect(defaults.activeRowColor).toBe('rgb(128, 144, 160)');
    expect(defaults.rowsBackgroundColorPalette.getColor(3, null)).toBe('#ffffff');
    expect(defaults.rowsTextColorPalette.getColor(0, null)).toBe('#000000');
    expect(defaults.fontSize).toBe(13);
    expect(defaults.fontFamily).toBeNull();
    expect(defaults.borderColor).toBe('#000000');
    expect(defaults.borderThickness).toBe(1);
    expect(defaults.columns.length).toBe(0);
  });

  // ===========================================================================
  // 선택
  // ===========================================================================

  describe('선택', () => {
    it('single 모드는 선택 교체', () => {
      const handler = vi.fn();
      grid.on('itemSelected', handler);

      grid.selectItem(employees[0]);
      grid.selectItem(employees[1]);

      expect(grid.selectedItem).toBe(employees[1]);
      expect(grid.selectedItems).toEqual([employees[1]]);
      expect(handler).toHaveBeenLastCalledWith({
        previousSelection: [employees[0]],
        currentSelection: [employees[1]],
      });
    });

    it('multiple 모드는 선택 추가', () => {
      grid.selectionMode = 'multiple';
      grid.selectItem(employees[0]);
      grid.selectItem(employees[2]);

      expect(grid.selectedItems).toEqual([employees[0], employees[2]]);
      expect(grid.selectedItem).toBe(employees[2]);

      grid.deselectItem(employees[2]);
      expect(grid.selectedItems).toEqual([employees[0]]);
      expect(grid.selectedItem).toBe(employees[0]);
    });

    it('multiple → single 전환 시 현재 항목만 유지', () => {
      grid.selectionMode = 'multiple';
      grid.selectItem(employees[0]);
      grid.selectItem(employees[1]);

      grid.selectionMode = 'single';

      expect(grid.selectedItems).toEqual([employees[1]]);
    });

    it('none 모드는 선택 해제 후 무시', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      grid.selectItem(employees[0]);

      grid.selectionMode = 'none';
      grid.selectItem(employees[1]);

      expect(grid.selectedItems).toEqual([]);
      expect(grid.selectedItem).toBeNull();
      expect(warnSpy).toHaveBeenCalledWith('[DataGrid] selectItem() ignored: selectionMode is "none"');
    });
  });

  // ===========================================================================
  // 데이터
  // ===========================================================================

  describe('setItems', () => {
    it('없어진 선택과 편집 행 해제', () => {
      grid.selectItem(employees[0]);
      grid.rowToEdit = employees[0];
      const changed: string[] = [];
      grid.onPropertyChanged(({ propertyName }) => changed.push(propertyName));

      grid.setItems([employees[1], employees[2]]);

      expect(grid.internalItems).toEqual([employees[1], employees[2]]);
      expect(grid.selectedItems).toEqual([]);
      expect(grid.rowToEdit).toBeNull();
      expect(changed).toEqual(['rowToEdit', 'internalItems']);
    });
  });

  // ===========================================================================
  // 외형
  // ===========================================================================

  describe('외형', () => {
    it('속성 변경 알림', () => {
      const handler = vi.fn();
      grid.onPropertyChanged(handler);

      grid.activeRowColor = 'teal';

      expect(handler).toHaveBeenCalledWith({
        propertyName: 'activeRowColor',
        oldValue: 'rgb(128, 144, 160)',
        newValue: 'teal',
      });
    });

    it('테두리 두께는 0 이상', () => {
      grid.borderThickness = -2;
      expect(grid.borderThickness).toBe(0);
    });

    it('같은 값이면 알리지 않음', () => {
      const handler = vi.fn();
      grid.onPropertyChanged(handler);

      grid.fontSize = 13;
      grid.rowToEdit = null;

      expect(handler).not.toHaveBeenCalled();
    });
  });
});
