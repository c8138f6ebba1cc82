export { formatInstant, parseInstant, tokenizeLayout, daysInMonth } from './layout.js';
export type { LayoutToken, LayoutPart } from './layout.js';
