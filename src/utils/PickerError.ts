/**
 * Operational error raised at the edges of the picker (input, options, config).
 * The matching core itself never throws.
 */
export class PickerError extends Error {
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly hint?: string;

  constructor(message: string, exitCode: number, isOperational = true, hint?: string) {
    super(message);
    this.name = 'PickerError';
    this.exitCode = exitCode;
    this.isOperational = isOperational;
    this.hint = hint;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, PickerError.prototype);
  }

  static noInput(): PickerError {
    return new PickerError(
      'No input provided. Please pipe some input into line-picker.',
      2,
      true,
      "Use 'line-picker --help' to learn more about how to use the program."
    );
  }

  static invalidOption(message: string): PickerError {
    return new PickerError(message, 2);
  }

  static config(message: string): PickerError {
    return new PickerError(`Invalid configuration: ${message}`, 78);
  }

  static internal(message = 'Internal error'): PickerError {
    return new PickerError(message, 1, false);
  }
}

export default PickerError;
