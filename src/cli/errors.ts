export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class DataFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string | null
  ) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'DataFileError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'ConfigError';
  }
}
