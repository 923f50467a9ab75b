export class ScreenerError extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ScreenerError";
  }
}

export class SchemaError extends ScreenerError {
  constructor(
    message: string,
    public readonly column: string | null = null,
    public readonly year: number | null = null,
  ) {
    super(message, { column, year });
    this.name = "SchemaError";
  }
}

export class FormulaError extends ScreenerError {
  constructor(
    message: string,
    public readonly formula: string | null = null,
    public readonly missingColumns: string[] = [],
    public readonly position: number | null = null,
  ) {
    super(message, { formula, missingColumns, position });
    this.name = "FormulaError";
  }
}

export class ConfigError extends ScreenerError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, { issues });
    this.name = "ConfigError";
  }
}

export class EmptyResultError extends ScreenerError {
  constructor(message: string) {
    super(message);
    this.name = "EmptyResultError";
  }
}
