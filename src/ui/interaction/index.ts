/**
 * Interaction 모듈 (편집)
 */

export {
  DEFAULT_EDITORS,
  createDefaultEditor,
  createColumnBinding,
  toDateInputValue,
  parseDateInputValue,
} from './EditorFactory';
export type { EditorContext, EditorConstructor } from './EditorFactory';
export {
  NUMERIC_PARSERS,
  INTEGER_RANGES,
  convertNumericText,
  isNumericDataType,
  isFloatingDataType,
  trimTrailingSeparators,
} from './numericParsers';
export type { TextParser } from './numericParsers';
