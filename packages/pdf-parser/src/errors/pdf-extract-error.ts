/**
 * PdfExtractError
 *
 * Thrown when page text cannot be obtained from a PDF.
 * Extraction has no meaningful partial result, so callers treat it as fatal.
 */
export class PdfExtractError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfExtractError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PdfExtractError from unknown error with context
   */
  static fromError(context: string, error: unknown): PdfExtractError {
    return new PdfExtractError(
      `${context}: ${PdfExtractError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
