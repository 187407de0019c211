export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number = 400) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

/**
 * Raised for an unknown jurisdiction code, a missing seed list or an invalid
 * jurisdiction file. Always thrown before any request is issued.
 */
export class JurisdictionConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JurisdictionConfigError';
  }
}
