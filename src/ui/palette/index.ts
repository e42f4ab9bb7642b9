export { PaletteCollection } from './PaletteCollection';
export type { ColorProvider } from './PaletteCollection';
