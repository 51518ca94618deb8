import type { PickerIO } from './cli';
import { PickerError } from './utils/PickerError';

/**
 * Loads the CLI and runs it. The CLI (and with it the environment config and
 * the logger) is imported here, so a configuration error surfaces as a
 * PickerError with its own exit code instead of failing at module load.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], io: PickerIO): Promise<number> {
  try {
    const { runCli } = await import('./cli');
    return await runCli(argv, io);
  } catch (error) {
    if (error instanceof PickerError && error.isOperational) {
      io.error.write(`Error: ${error.message}\n`);
      if (error.hint) {
        io.error.write(`${error.hint}\n`);
      }
      return error.exitCode;
    }

    const { logger } = await import('./utils');
    logger.error('line-picker failed:', error);
    return error instanceof PickerError ? error.exitCode : 1;
  }
}

export default main;
