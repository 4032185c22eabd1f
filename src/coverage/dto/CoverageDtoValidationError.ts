/**
 * CoverageDtoValidationError
 *
 * Thrown when an incoming payload or path parameter does not match the expected DTO contract.
 * Issues are kept structured so the HTTP error handler can return them as-is.
 */
export class CoverageDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'CoverageDtoValidationError';
    this.issues = issues;
  }
}
