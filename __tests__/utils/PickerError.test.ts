import { PickerError } from '../../src/utils/PickerError';

describe('PickerError', () => {
  describe('constructor', () => {
    it('should create an error with message and exit code', () => {
      const error = new PickerError('Test error', 2);

      expect(error.message).toBe('Test error');
      expect(error.exitCode).toBe(2);
      expect(error.isOperational).toBe(true);
      expect(error.hint).toBeUndefined();
    });

    it('should create a non-operational error', () => {
      const error = new PickerError('Internal error', 1, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new PickerError('Test', 2);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(PickerError);
      expect(error.name).toBe('PickerError');
    });

    it('should capture stack trace', () => {
      expect(new PickerError('Test', 2).stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create a no-input error with a hint', () => {
      const error = PickerError.noInput();

      expect(error.exitCode).toBe(2);
      expect(error.message).toBe('No input provided. Please pipe some input into line-picker.');
      expect(error.hint).toBe(
        "Use 'line-picker --help' to learn more about how to use the program."
      );
    });

    it('should create an invalid option error', () => {
      const error = PickerError.invalidOption('Bad option');

      expect(error.exitCode).toBe(2);
      expect(error.message).toBe('Bad option');
    });

    it('should create a configuration error', () => {
      const error = PickerError.config('LOG_LEVEL: Invalid enum value');

      expect(error.exitCode).toBe(78);
      expect(error.message).toBe('Invalid configuration: LOG_LEVEL: Invalid enum value');
    });

    it('should create a non-operational internal error', () => {
      const error = PickerError.internal();

      expect(error.exitCode).toBe(1);
      expect(error.message).toBe('Internal error');
      expect(error.isOperational).toBe(false);
    });
  });
});
