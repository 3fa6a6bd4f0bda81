export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/** Single printable ASCII character (space through tilde). */
export function isPrintableAsciiKey(name: string): boolean {
  if (name.length !== 1) return false;
  const code = name.charCodeAt(0);
  return code >= 0x20 && code <= 0x7e;
}
