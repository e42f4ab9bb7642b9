/**
 * DataGrid - 그리드 상태
 *
 * 행(DataGridRow)이 소비하는 그리드 표면입니다.
 * - 컬럼 목록 (ObservableList)
 * - 데이터 항목과 선택 상태
 * - 편집 중인 행 (rowToEdit)
 * - 색상 팔레트, 글꼴, 테두리
 *
 * 가상화, 정렬, 필터링 같은 전체 그리드 엔진 기능은 포함하지 않습니다.
 */

import { SimpleEventEmitter } from '../core/SimpleEventEmitter';
import { ObservableList } from '../core/ObservableList';
import type { PropertyChangeSource } from '../core/ObservableObject';
import type {
  Color,
  DataGridOptions,
  PropertyChangedPayload,
  SelectionChangedPayload,
  SelectionMode,
  Unsubscribe,
} from '../types';
import type { DataGridColumn } from './column/DataGridColumn';
import { PaletteCollection } from './palette/PaletteCollection';
import type { ColorProvider } from './palette/PaletteCollection';

/**
 * DataGrid 이벤트 타입
 */
interface DataGridEvents<T> {
  /** 선택 변경 */
  itemSelected: SelectionChangedPayload<T>;
  /** 속성 변경 */
  propertyChanged: PropertyChangedPayload;
}

/**
 * 기본 옵션
 */
export const DEFAULT_DATA_GRID_OPTIONS = {
  selectionMode: 'single',
  activeRowColor: 'rgb(128, 144, 160)',
  rowsBackgroundColorPalette: ['#ffffff'],
  rowsTextColorPalette: ['#000000'],
  fontSize: 13,
  fontFamily: null,
  borderColor: '#000000',
  borderThickness: 1,
} as const;

/**
 * 그리드 상태
 */
export class DataGrid<T = unknown> extends SimpleEventEmitter<DataGridEvents<T>> implements PropertyChangeSource {
  /** 컬럼 목록 */
  readonly columns: ObservableList<DataGridColumn>;

  private items: T[];
  private _selectionMode: SelectionMode;
  private _selectedItem: T | null = null;
  private _selectedItems: T[] = [];
  private _rowToEdit: T | null = null;
  private _activeRowColor: Color;
  private _rowsBackgroundColorPalette: ColorProvider;
  private _rowsTextColorPalette: ColorProvider;
  private _fontSize: number;
  private _fontFamily: string | null;
  private _borderColor: Color;
  private _borderThickness: number;

  constructor(options: DataGridOptions<T> = {}) {
    super();

    const defaults = DEFAULT_DATA_GRID_OPTIONS;
    this.columns = new ObservableList(options.columns ?? []);
    this.items = [...(options.items ?? [])];
    this._selectionMode = options.selectionMode ?? defaults.selectionMode;
    this._activeRowColor = options.activeRowColor ?? defaults.activeRowColor;
    this._rowsBackgroundColorPalette =
      options.rowsBackgroundColorPalette ?? new PaletteCollection(defaults.rowsBackgroundColorPalette);
    this._rowsTextColorPalette =
      options.rowsTextColorPalette ?? new PaletteCollection(defaults.rowsTextColorPalette);
    this._fontSize = options.fontSize ?? defaults.fontSize;
    this._fontFamily = options.fontFamily ?? defaults.fontFamily;
    this._borderColor = options.borderColor ?? defaults.borderColor;
    this._borderThickness = options.borderThickness ?? defaults.borderThickness;
  }

  // ===========================================================================
  // 데이터
  // ===========================================================================

  /**
   * 표시 순서의 데이터 항목
   */
  get internalItems(): readonly T[] {
    return this.items;
  }

  /**
   * 데이터 교체
   *
   * 새 목록에 없는 선택 항목과 편집 행은 해제됩니다.
   */
  setItems(items: readonly T[]): void {
    const old = this.items;
    this.items = [...items];

    const kept = this._selectedItems.filter((item) => this.items.includes(item));
    if (kept.length !== this._selectedItems.length) {
      this.updateSelection(
        kept,
        this._selectedItem !== null && this.items.includes(this._selectedItem) ? this._selectedItem : null
      );
    }
    if (this._rowToEdit !== null && !this.items.includes(this._rowToEdit)) {
      this.rowToEdit = null;
    }

    this.notify('internalItems', old, this.items);
  }

  // ===========================================================================
  // 선택
  // ===========================================================================

  get selectionMode(): SelectionMode {
    return this._selectionMode;
  }

  set selectionMode(value: SelectionMode) {
    const old = this._selectionMode;
    if (old === value) return;
    this._selectionMode = value;

    if (value === 'none') {
      this.updateSelection([], null);
    } else if (value === 'single' && this._selectedItems.length > 1) {
      this.updateSelection(this._selectedItem === null ? [] : [this._selectedItem], this._selectedItem);
    }
    this.notify('selectionMode', old, value);
  }

  get selectedItem(): T | null {
    return this._selectedItem;
  }

  get selectedItems(): readonly T[] {
    return this._selectedItems;
  }

  /**
   * 항목 선택
   *
   * - single: 기존 선택을 교체
   * - multiple: 선택에 추가
   */
  selectItem(item: T): void {
    if (this._selectionMode === 'none') {
      console.warn('[DataGrid] selectItem() ignored: selectionMode is "none"');
      return;
    }

    if (this._selectionMode === 'single') {
      if (this._selectedItem === item) return;
      this.updateSelection([item], item);
      return;
    }

    if (this._selectedItems.includes(item)) return;
    this.updateSelection([...this._selectedItems, item], item);
  }

  /**
   * 항목 선택 해제
   */
  deselectItem(item: T): void {
    if (!this._selectedItems.includes(item)) return;

    const remaining = this._selectedItems.filter((selected) => selected !== item);
    const current = this._selectedItem === item ? (remaining[remaining.length - 1] ?? null) : this._selectedItem;
    this.updateSelection(remaining, current);
  }

  /**
   * 전체 선택 해제
   */
  clearSelection(): void {
    if (this._selectedItems.length === 0 && this._selectedItem === null) return;
    this.updateSelection([], null);
  }

  // ===========================================================================
  // 편집
  // ===========================================================================

  /**
   * 편집 중인 항목 (없으면 null)
   */
  get rowToEdit(): T | null {
    return this._rowToEdit;
  }

  set rowToEdit(value: T | null) {
    const old = this._rowToEdit;
    this._rowToEdit = value;
    this.notify('rowToEdit', old, value);
  }

  // ===========================================================================
  // 외형
  // ===========================================================================

  get activeRowColor(): Color {
    return this._activeRowColor;
  }

  set activeRowColor(value: Color) {
    const old = this._activeRowColor;
    this._activeRowColor = value;
    this.notify('activeRowColor', old, value);
  }

  get rowsBackgroundColorPalette(): ColorProvider {
    return this._rowsBackgroundColorPalette;
  }

  set rowsBackgroundColorPalette(value: ColorProvider) {
    const old = this._rowsBackgroundColorPalette;
    this._rowsBackgroundColorPalette = value;
    this.notify('rowsBackgroundColorPalette', old, value);
  }

  get rowsTextColorPalette(): ColorProvider {
    return this._rowsTextColorPalette;
  }

  set rowsTextColorPalette(value: ColorProvider) {
    const old = this._rowsTextColorPalette;
    this._rowsTextColorPalette = value;
    this.notify('rowsTextColorPalette', old, value);
  }

  get fontSize(): number {
    return this._fontSize;
  }

  set fontSize(value: number) {
    const old = this._fontSize;
    this._fontSize = value;
    this.notify('fontSize', old, value);
  }

  get fontFamily(): string | null {
    return this._fontFamily;
  }

  set fontFamily(value: string | null) {
    const old = this._fontFamily;
    this._fontFamily = value;
    this.notify('fontFamily', old, value);
  }

  get borderColor(): Color {
    return this._borderColor;
  }

  set borderColor(value: Color) {
    const old = this._borderColor;
    this._borderColor = value;
    this.notify('borderColor', old, value);
  }

  get borderThickness(): number {
    return this._borderThickness;
  }

  set borderThickness(value: number) {
    const old = this._borderThickness;
    this._borderThickness = Math.max(0, value);
    this.notify('borderThickness', old, this._borderThickness);
  }

  // ===========================================================================
  // 이벤트
  // ===========================================================================

  /**
   * 속성 변경 구독
   */
  onPropertyChanged(handler: (payload: PropertyChangedPayload) => void): Unsubscribe {
    return this.on('propertyChanged', handler);
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private updateSelection(selectedItems: T[], selectedItem: T | null): void {
    const previousSelection = this._selectedItems;
    this._selectedItems = selectedItems;
    this._selectedItem = selectedItem;
    this.emit('itemSelected', { previousSelection, currentSelection: [...selectedItems] });
  }

  private notify(propertyName: string, oldValue: unknown, newValue: unknown): void {
    if (oldValue === newValue) return;
    this.emit('propertyChanged', { propertyName, oldValue, newValue });
  }
}
