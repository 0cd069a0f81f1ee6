/**
 * Custom error class for failures raised by the input state package.
 * Preserves the original error when one was caught and rethrown.
 */
export class InputStateError extends Error {
  /**
   * @param message The error message.
   * @param originalError The original error, if any.
   */
  constructor(
    message: string,
    public originalError?: Error,
  ) {
    super(message);
    this.name = 'InputStateError';
  }
}
