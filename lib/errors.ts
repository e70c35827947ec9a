export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class CountryNotFoundError extends AppError {
  readonly country: string;
  readonly dataset: string;

  constructor(country: string, dataset: string) {
    super(`Country "${country}" not found in ${dataset} data`, 404);
    this.country = country;
    this.dataset = dataset;
  }
}

export class SelectionError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid selection: ${issues.join("; ")}`, 400);
    this.issues = issues;
  }
}

export class InsufficientDataError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
