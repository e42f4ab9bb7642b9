export { DataGridCell } from './DataGridCell';
export type { CellBorderSource } from './DataGridCell';
export type { CellContent, CellContentKind, CellStyleContext } from './types';
