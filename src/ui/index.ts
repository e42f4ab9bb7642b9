/**
 * UI Layer 진입점
 */

// 그리드 상태
export { DataGrid, DEFAULT_DATA_GRID_OPTIONS } from './DataGrid';

// Row 모듈
export { DataGridRow, RowCellFactory } from './row';
export type { DataGridRowOptions } from './row';

// Cell 모듈
export { DataGridCell } from './cell';
export type { CellBorderSource, CellContent, CellContentKind, CellStyleContext } from './cell';

// Column 모듈
export { DataGridColumn } from './column';
export type { DataGridColumnOptions } from './column';

// Palette 모듈
export { PaletteCollection } from './palette';
export type { ColorProvider } from './palette';

// Interaction 모듈
export * from './interaction';

// CSS 유틸리티
export { toGridTrack, toCSSValue } from './utils/cssUtils';
