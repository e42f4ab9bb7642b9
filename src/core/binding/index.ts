export { PropertyBinding } from './PropertyBinding';
export type { BindingMode, BindingOptions } from './PropertyBinding';
export { formatValue, toDisplayString } from './format';
export { resolvePath, writePath, splitPath, isBlankPath } from './propertyPath';
