export { tokenize, assertAscii } from './tokenize.js';
export { wrapText, splitLogicalLines, logicalLineSpans, type LineSpan } from './wrap.js';
export { cursorAt } from './cursor-map.js';
export { layoutInput, type InputLayoutResult } from './input-layout.js';
export { NonAsciiTextError } from './errors.js';
export { WRAP_MODES, type WrapMode, type Rect, type CursorPosition, type Token } from './types.js';
