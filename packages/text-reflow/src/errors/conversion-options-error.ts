/**
 * ConversionOptionsError
 *
 * Thrown when DocumentConverter receives options that fail validation.
 */
export class ConversionOptionsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConversionOptionsError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ConversionOptionsError from unknown error with context
   */
  static fromError(context: string, error: unknown): ConversionOptionsError {
    return new ConversionOptionsError(
      `${context}: ${ConversionOptionsError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
