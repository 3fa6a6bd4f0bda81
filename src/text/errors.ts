export class NonAsciiTextError extends Error {
  constructor(
    public readonly column: number,
    public readonly character: string
  ) {
    super(`Unsupported non-ASCII character '${character}' at column ${column + 1}`);
    this.name = 'NonAsciiTextError';
  }
}
