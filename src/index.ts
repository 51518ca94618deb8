#!/usr/bin/env node
import { main } from './main';

/**
 * Logs a fatal error through the logger when it can be loaded, then exits 1
 */
const exitWithError = (label: string, reason: unknown): void => {
  void import('./utils')
    .then(({ logger }) => {
      logger.error(label, reason);
    })
    .catch(() => {
      process.stderr.write(`${label} ${String(reason)}\n`);
    })
    .finally(() => process.exit(1));
};

// Handle uncaught exceptions
process.on('uncaughtException', (err: Error) => exitWithError('Uncaught Exception:', err));

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => exitWithError('Unhandled Rejection:', reason));

void main(process.argv.slice(2), {
  input: process.stdin,
  output: process.stdout,
  error: process.stderr,
}).then((code) => {
  process.exitCode = code;
});
