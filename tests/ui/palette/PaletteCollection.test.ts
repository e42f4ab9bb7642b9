import { describe, it, expect } from 'vitest';
import { PaletteCollection } from '../../../src/ui/palette/PaletteCollection';

describe('PaletteCollection', () => {
  it('행 인덱스로 순환', () => {
    const palette = new PaletteCollection(['white', 'gray', 'silver']);
    expect(palette.getColor(0, null)).toBe('white');
    expect(palette.getColor(4, null)).toBe('gray');
    expect(palette.getColor(5, null)).toBe('silver');
  });

  it('빈 팔레트나 음수 인덱스는 null', () => {
    expect(new PaletteCollection().getColor(0, null)).toBeNull();
    expect(new PaletteCollection(['white']).getColor(-1, null)).toBeNull();
  });

  it('원본 배열과 분리', () => {
    const colors = ['white'];
    const palette = new PaletteCollection(colors);
    colors.push('black');

    expect(palette.length).toBe(1);
    expect(palette.toArray()).toEqual(['white']);
  });
});
