import { describe, expect, it } from 'vitest';
import { isPrintableAsciiKey, isSpaceKeyName } from '../../src/tui/key-utils.js';

describe('isSpaceKeyName', () => {
  it('treats both SPACE and literal space as space', () => {
    expect(isSpaceKeyName('SPACE')).toBe(true);
    expect(isSpaceKeyName(' ')).toBe(true);
  });

  it('rejects non-space keys', () => {
    expect(isSpaceKeyName('ENTER')).toBe(false);
    expect(isSpaceKeyName('a')).toBe(false);
    expect(isSpaceKeyName('')).toBe(false);
  });
});

describe('isPrintableAsciiKey', () => {
  it('accepts single printable ASCII characters', () => {
    expect(isPrintableAsciiKey('a')).toBe(true);
    expect(isPrintableAsciiKey('~')).toBe(true);
    expect(isPrintableAsciiKey(' ')).toBe(true);
  });

  it('rejects named keys, control and non-ASCII characters', () => {
    expect(isPrintableAsciiKey('ENTER')).toBe(false);
    expect(isPrintableAsciiKey('\t')).toBe(false);
    expect(isPrintableAsciiKey('é')).toBe(false);
    expect(isPrintableAsciiKey('')).toBe(false);
  });
});
