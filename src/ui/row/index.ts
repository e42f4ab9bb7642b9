/**
 * Row 모듈
 */

export { DataGridRow } from './DataGridRow';
export type { DataGridRowOptions } from './DataGridRow';
export { RowCellFactory } from './RowCellFactory';
