/**
 * Command-line output helpers. Each message is printed for the user and
 * mirrored into the structured log.
 */

import chalk from 'chalk';
import { createSubsystemLogger } from './logging/subsystem.js';

const log = createSubsystemLogger('cli');

export function logInfo(message: string): void {
  log.info(message);
  process.stdout.write(`${message}\n`);
}

export function logWarn(message: string): void {
  log.warn(message);
  process.stderr.write(`${chalk.yellow(message)}\n`);
}

export function logError(message: string): void {
  log.error(message);
  process.stderr.write(`${chalk.red(message)}\n`);
}
