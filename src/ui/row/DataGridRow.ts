/**
 * DataGridRow - 그리드 행
 *
 * 데이터 항목 하나를 CSS grid 행으로 렌더링합니다.
 *
 * 핵심 개념:
 * - 셀은 컬럼 인덱스로 관리 (cells.get(i) ↔ columns.at(i))
 * - 숨김 컬럼은 트랙 너비 0, 셀 없음
 * - 편집 행(rowToEdit === item)이면 에디터 셀, 아니면 표시 셀
 *
 * 다음 알림마다 initializeRow()로 셀 구조를 컬럼 목록에 맞춥니다.
 * - 항목 변경 (setItem)
 * - 컬럼 목록 변경 (collectionChanged)
 * - 컬럼 가시성/너비 변경
 * - 편집 행 변경 (rowToEdit)
 *
 * 선택 변경과 팔레트 변경은 색상만 갱신합니다.
 */

import type { Color, SelectionChangedPayload, Unsubscribe } from '../../types';
import type { DataGrid } from '../DataGrid';
import { DataGridCell } from '../cell/DataGridCell';
import type { DataGridColumn } from '../column/DataGridColumn';
import type { EditorContext } from '../interaction/EditorFactory';
import { RowCellFactory } from './RowCellFactory';

/**
 * 색상에 영향을 주는 그리드 속성
 */
const COLOR_PROPERTIES: ReadonlySet<string> = new Set([
  'activeRowColor',
  'rowsBackgroundColorPalette',
  'rowsTextColorPalette',
  'internalItems',
  'selectionMode',
]);

/**
 * DataGridRow 설정
 */
export interface DataGridRowOptions<T> {
  /** 소속 그리드 */
  dataGrid: DataGrid<T>;
  /** 초기 데이터 항목 */
  item?: T | null;
  /** 셀 내용 생성기 (기본: RowCellFactory) */
  cellFactory?: RowCellFactory;
}

/**
 * 그리드 행
 */
export class DataGridRow<T = unknown> {
  /** 행 요소 */
  readonly element: HTMLDivElement;
  /** 소속 그리드 */
  readonly dataGrid: DataGrid<T>;

  private readonly cellFactory: RowCellFactory;

  // 바인딩 상태
  private item: T | null;
  private rowToEdit: T | null = null;

  // 색상 캐시
  private backgroundColor: Color | null = null;
  private textColor: Color | null = null;
  private wasSelected = false;

  // 레이아웃 (컬럼 인덱스 → 트랙 / 셀)
  private columnDefinitions: string[] = [];
  private cells = new Map<number, DataGridCell<T>>();

  // 구독
  private gridSubscriptions: Unsubscribe[] = [];
  private columnSubscriptions: Unsubscribe[] = [];
  private attached = false;

  constructor(options: DataGridRowOptions<T>) {
    this.dataGrid = options.dataGrid;
    this.item = options.item ?? null;
    this.cellFactory = options.cellFactory ?? new RowCellFactory();

    this.element = document.createElement('div');
    this.element.className = 'dg-row';
    this.element.setAttribute('role', 'row');
    this.element.style.display = 'grid';

    this.initializeRow();
  }

  // ===========================================================================
  // 공개 API - 바인딩
  // ===========================================================================

  /**
   * 바인딩된 데이터 항목
   */
  getItem(): T | null {
    return this.item;
  }

  /**
   * 데이터 항목 변경 (행 재사용 시)
   */
  setItem(item: T | null): void {
    if (this.item === item) return;
    this.item = item;
    this.initializeRow();
  }

  /**
   * 편집 중인 항목
   */
  getRowToEdit(): T | null {
    return this.rowToEdit;
  }

  /**
   * 편집 중인 항목 변경
   *
   * 이전 값이나 새 값이 이 행의 항목일 때만 셀을 다시 만듭니다.
   */
  setRowToEdit(value: T | null): void {
    const old = this.rowToEdit;
    if (old === value) return;
    this.rowToEdit = value;

    if (old === this.item || value === this.item) {
      this.initializeRow();
    }
  }

  /**
   * 편집 행 여부
   */
  isEditing(): boolean {
    return this.item !== null && this.rowToEdit === this.item;
  }

  /**
   * 선택 여부 (마지막 갱신 기준)
   */
  isSelected(): boolean {
    return this.wasSelected;
  }

  // ===========================================================================
  // 공개 API - 레이아웃 조회
  // ===========================================================================

  getBackgroundColor(): Color | null {
    return this.backgroundColor;
  }

  getTextColor(): Color | null {
    return this.textColor;
  }

  /**
   * 컬럼별 grid 트랙
   */
  getColumnDefinitions(): readonly string[] {
    return [...this.columnDefinitions];
  }

  /**
   * 컬럼 인덱스의 셀
   */
  getCell(columnIndex: number): DataGridCell<T> | undefined {
    return this.cells.get(columnIndex);
  }

  /**
   * 컬럼 순서의 셀 목록
   */
  getCells(): DataGridCell<T>[] {
    return [...this.cells.entries()].sort(([a], [b]) => a - b).map(([, cell]) => cell);
  }

  // ===========================================================================
  // 공개 API - 생명주기
  // ===========================================================================

  /**
   * 부모 요소에 추가하고 그리드/컬럼 이벤트 구독
   */
  attach(parent: HTMLElement): void {
    if (this.attached) {
      this.detach();
    }

    parent.appendChild(this.element);
    this.attached = true;

    this.gridSubscriptions = [
      this.dataGrid.on('itemSelected', this.handleItemSelected),
      this.dataGrid.columns.on('collectionChanged', this.handleColumnsChanged),
      this.dataGrid.on('propertyChanged', ({ propertyName }) => this.handleGridPropertyChanged(propertyName)),
    ];
    this.subscribeColumns();

    this.rowToEdit = this.dataGrid.rowToEdit;
    this.initializeRow();
  }

  /**
   * 부모에서 제거하고 구독 해제
   */
  detach(): void {
    if (!this.attached) return;

    for (const unsubscribe of this.gridSubscriptions) {
      unsubscribe();
    }
    this.gridSubscriptions = [];
    this.unsubscribeColumns();

    this.element.remove();
    this.attached = false;
  }

  /**
   * 셀 구조/색상 다시 계산
   */
  refresh(): void {
    this.initializeRow();
  }

  /**
   * 리소스 해제
   */
  destroy(): void {
    this.detach();
    this.removeAllCells();
    this.columnDefinitions = [];
    this.applyColumnDefinitions();
  }

  // ===========================================================================
  // Private - 행 초기화
  // ===========================================================================

  /**
   * 셀 구조를 컬럼 목록에 맞춤
   */
  private initializeRow(): void {
    this.updateSelectedState();
    this.updateColors();

    const columns = this.dataGrid.columns;

    if (columns.length === 0) {
      this.columnDefinitions = [];
      this.applyColumnDefinitions();
      this.removeAllCells();
      return;
    }

    const editing = this.isEditing();

    for (let i = 0; i < columns.length; i++) {
      const column = columns.at(i);
      if (!column) continue;

      // 트랙 추가/갱신
      this.columnDefinitions[i] = column.columnDefinition;

      if (!column.isVisible) {
        this.removeCell(i);
        continue;
      }

      const existing = this.cells.get(i);
      if (existing) {
        this.assertCellOwnership(existing, i);

        if (existing.column !== column || existing.isEditing !== editing || existing.item !== this.item) {
          this.replaceCell(i, existing, this.generateCellForColumn(column, i));
        }
      } else {
        this.insertCell(i, this.generateCellForColumn(column, i));
      }
    }

    // 남는 트랙/셀 제거
    this.columnDefinitions.length = columns.length;
    for (const index of [...this.cells.keys()]) {
      if (index >= columns.length) {
        this.removeCell(index);
      }
    }

    this.applyColumnDefinitions();
  }

  /**
   * 컬럼 셀 생성
   */
  private generateCellForColumn(column: DataGridColumn, columnIndex: number): DataGridCell<T> {
    const editing = this.isEditing();
    const context: EditorContext = {
      column,
      item: this.item,
      backgroundColor: this.backgroundColor,
      textColor: this.textColor,
      fontSize: this.dataGrid.fontSize,
      fontFamily: this.dataGrid.fontFamily,
    };

    const content = editing
      ? this.cellFactory.createEditContent(context)
      : this.cellFactory.createViewContent(context);

    const cell = new DataGridCell<T>(content, this.backgroundColor, this.textColor, column, editing, this.item);
    cell.updateBindings(this.dataGrid);
    cell.setColumnIndex(columnIndex);
    return cell;
  }

  // ===========================================================================
  // Private - 셀 DOM 관리
  // ===========================================================================

  /**
   * 컬럼 순서를 유지하며 셀 삽입
   */
  private insertCell(columnIndex: number, cell: DataGridCell<T>): void {
    let next: DataGridCell<T> | undefined;
    let nextIndex = Infinity;
    for (const [index, candidate] of this.cells) {
      if (index > columnIndex && index < nextIndex) {
        next = candidate;
        nextIndex = index;
      }
    }

    this.element.insertBefore(cell.element, next?.element ?? null);
    this.cells.set(columnIndex, cell);
  }

  private replaceCell(columnIndex: number, existing: DataGridCell<T>, cell: DataGridCell<T>): void {
    existing.element.replaceWith(cell.element);
    existing.dispose();
    this.cells.set(columnIndex, cell);
  }

  private removeCell(columnIndex: number): void {
    const cell = this.cells.get(columnIndex);
    if (!cell) return;
    cell.dispose();
    this.cells.delete(columnIndex);
  }

  private removeAllCells(): void {
    for (const cell of this.cells.values()) {
      cell.dispose();
    }
    this.cells.clear();
  }

  /**
   * 셀 요소가 외부에서 떼어졌는지 검사
   *
   * refresh(), setItem(), attach()에서는 호출자에게 예외가 전달됩니다.
   * 그리드/컬럼 이벤트 핸들러에서 실행되면 SimpleEventEmitter.emit이 예외를 잡아
   * console.error로만 기록합니다.
   *
   * @throws {Error} 셀 요소가 행의 자식이 아닐 때
   */
  private assertCellOwnership(cell: DataGridCell<T>, columnIndex: number): void {
    if (cell.element.parentElement !== this.element) {
      throw new Error(`[DataGridRow] Cell at column ${columnIndex} is no longer a child of its row`);
    }
  }

  private applyColumnDefinitions(): void {
    this.element.style.gridTemplateColumns = this.columnDefinitions.join(' ');
  }

  // ===========================================================================
  // Private - 선택/색상
  // ===========================================================================

  private updateSelectedState(): void {
    const { item } = this;
    this.wasSelected =
      item !== null && (this.dataGrid.selectedItem === item || this.dataGrid.selectedItems.includes(item));
    this.element.classList.toggle('dg-row-selected', this.wasSelected);
  }

  /**
   * 색상 갱신
   *
   * 항목이 그리드 목록에 없으면 이전 색상을 유지합니다.
   */
  private updateColors(): void {
    const { item, dataGrid } = this;
    const rowIndex = item === null ? -1 : dataGrid.internalItems.indexOf(item);
    if (rowIndex === -1) return;

    this.backgroundColor =
      dataGrid.selectionMode !== 'none' && this.wasSelected
        ? dataGrid.activeRowColor
        : dataGrid.rowsBackgroundColorPalette.getColor(rowIndex, item);
    this.textColor = dataGrid.rowsTextColorPalette.getColor(rowIndex, item);

    for (const cell of this.cells.values()) {
      cell.updateCellColors(this.backgroundColor, this.textColor);
    }
  }

  // ===========================================================================
  // Private - 이벤트 핸들러
  // ===========================================================================

  private handleItemSelected = ({ currentSelection }: SelectionChangedPayload<T>): void => {
    const { item } = this;
    if (this.wasSelected || (item !== null && currentSelection.includes(item))) {
      this.updateSelectedState();
      this.updateColors();
    }
  };

  private handleColumnsChanged = (): void => {
    // 새로 추가된 컬럼의 가시성도 구독
    this.unsubscribeColumns();
    this.subscribeColumns();
    this.initializeRow();
  };

  private handleGridPropertyChanged(propertyName: string): void {
    if (propertyName === 'rowToEdit') {
      this.setRowToEdit(this.dataGrid.rowToEdit);
      return;
    }
    if (COLOR_PROPERTIES.has(propertyName)) {
      this.updateSelectedState();
      this.updateColors();
    }
  }

  private subscribeColumns(): void {
    for (const column of this.dataGrid.columns) {
      this.columnSubscriptions.push(
        column.onVisibilityChanged(() => this.initializeRow()),
        column.onPropertyChanged(({ propertyName }) => {
          if (propertyName === 'width') {
            this.initializeRow();
          }
        })
      );
    }
  }

  private unsubscribeColumns(): void {
    for (const unsubscribe of this.columnSubscriptions) {
      unsubscribe();
    }
    this.columnSubscriptions = [];
  }
}
