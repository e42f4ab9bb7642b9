/**
 * PaletteCollection - 행 색상 팔레트
 *
 * 행 인덱스로 색상을 순환 선택합니다 (줄무늬 배경 등).
 * 항목별 색상이 필요하면 ColorProvider를 직접 구현합니다.
 *
 * @example
 * ```ts
 * const zebra = new PaletteCollection(['#ffffff', '#f3f3f3']);
 * zebra.getColor(3, item); // '#f3f3f3'
 *
 * const byStatus: ColorProvider = {
 *   getColor: (_index, item) => (isOverdue(item) ? '#ffd6d6' : null),
 * };
 * ```
 */

import type { Color } from '../../types';

/**
 * 행 색상 제공자
 */
export interface ColorProvider {
  /**
   * 행 색상 조회
   *
   * @returns 색상 (없으면 null)
   */
  getColor(rowIndex: number, item: unknown): Color | null;
}

/**
 * 순환 팔레트
 */
export class PaletteCollection implements ColorProvider {
  private readonly colors: readonly Color[];

  constructor(colors: Iterable<Color> = []) {
    this.colors = [...colors];
  }

  get length(): number {
    return this.colors.length;
  }

  getColor(rowIndex: number, _item?: unknown): Color | null {
    if (this.colors.length === 0 || rowIndex < 0) return null;
    return this.colors[rowIndex % this.colors.length] ?? null;
  }

  toArray(): Color[] {
    return [...this.colors];
  }
}
