/**
 * 타입 진입점
 */

export * from './column.types';
export * from './grid.types';
