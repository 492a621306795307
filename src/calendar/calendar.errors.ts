export class UnsupportedDialectError extends Error {
  constructor(dialect: string) {
    super(`Unsupported calendar dialect: ${dialect}`);
    this.name = 'UnsupportedDialectError';
  }
}

export class CalendarExportError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'CalendarExportError';
  }
}
