export { DataGridColumn } from './DataGridColumn';
export type { DataGridColumnOptions } from './DataGridColumn';
