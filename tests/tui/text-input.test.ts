import { describe, expect, it } from 'vitest';
import { applyTextInputKey, createTextInput } from '../../src/tui/text-input.js';

describe('createTextInput', () => {
  it('puts the cursor at the end unless told otherwise', () => {
    expect(createTextInput('abc')).toEqual({ value: 'abc', cursor: 3 });
    expect(createTextInput('abc', 1)).toEqual({ value: 'abc', cursor: 1 });
    expect(createTextInput('abc', 10)).toEqual({ value: 'abc', cursor: 3 });
  });
});

describe('applyTextInputKey', () => {
  it('inserts printable characters at the cursor', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'x')).toEqual({
      state: { value: 'axbc', cursor: 2 },
      didChangeValue: true,
    });
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'SPACE')?.state).toEqual({ value: 'ab ', cursor: 3 });
  });

  it('ignores non-ASCII characters and keys left to callers', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'é')).toBe(null);
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'ENTER')).toBe(null);
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'ESCAPE')).toBe(null);
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'TAB')).toBe(null);
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'F5')).toBe(null);
  });

  it('moves the cursor within bounds', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'LEFT')?.state.cursor).toBe(0);
    expect(applyTextInputKey({ value: 'abc', cursor: 3 }, 'RIGHT')?.state.cursor).toBe(3);
    expect(applyTextInputKey({ value: 'abc', cursor: 2 }, 'HOME')?.state.cursor).toBe(0);
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'END')?.state.cursor).toBe(3);
  });

  it('moves by words', () => {
    expect(applyTextInputKey({ value: '  foo bar', cursor: 0 }, 'ALT_RIGHT')?.state.cursor).toBe(5);
    expect(applyTextInputKey({ value: 'foo bar  ', cursor: 9 }, 'CTRL_LEFT')?.state.cursor).toBe(4);
  });

  it('deletes around the cursor', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 2 }, 'BACKSPACE')).toEqual({
      state: { value: 'ac', cursor: 1 },
      didChangeValue: true,
    });
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'BACKSPACE')).toEqual({
      state: { value: 'abc', cursor: 0 },
      didChangeValue: false,
    });
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'DELETE')?.state).toEqual({ value: 'ac', cursor: 1 });
    expect(applyTextInputKey({ value: 'abc', cursor: 3 }, 'DELETE')?.didChangeValue).toBe(false);
  });

  it('deletes words and line halves', () => {
    expect(applyTextInputKey({ value: 'hello world', cursor: 11 }, 'CTRL_W')?.state).toEqual({
      value: 'hello ',
      cursor: 6,
    });
    expect(applyTextInputKey({ value: 'abcdef', cursor: 3 }, 'CTRL_U')?.state).toEqual({ value: 'def', cursor: 0 });
    expect(applyTextInputKey({ value: 'abcdef', cursor: 3 }, 'CTRL_K')?.state).toEqual({ value: 'abc', cursor: 3 });
  });

  it('clamps a stale cursor before editing', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 9 }, 'c')?.state).toEqual({ value: 'abc', cursor: 3 });
  });
});
