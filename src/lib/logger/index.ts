import * as RC from 'fp-ts/lib/Record';

import chalk from 'chalk';

import { pipe, constVoid } from 'fp-ts/lib/function';
import { Logger, LogLevels, LogTypes, LogTransporter } from './types';

export * from './types';

export const customConsoleTransporters: Logger = {
  DEBUG(message) {
    return () => console.debug(chalk.grey.bold('DEBUG: ') + message);
  },

  INFO(message) {
    return () => console.info(chalk.blueBright.bold('INFO: ') + message);
  },

  WARN(message) {
    return () => console.warn(chalk.yellowBright.bold('WARNING: ') + message);
  },

  ERROR(message) {
    return () => console.error(chalk.redBright.bold('ERROR: ') + message);
  },
};

const silentTransporter: LogTransporter = () => constVoid;

export const silentLogger: Logger = {
  DEBUG: silentTransporter,
  INFO: silentTransporter,
  WARN: silentTransporter,
  ERROR: silentTransporter,
};

export function isLogLevelEnabled(minimumLogLevel: LogTypes) {
  return (logType: LogTypes): boolean => LogLevels[logType] >= LogLevels[minimumLogLevel];
}

// Transporters below the minimum level become no-ops
export function createLogger(
  minimumLogLevel: LogTypes,
  transporters: Logger = customConsoleTransporters
): Logger {
  const isEnabled = isLogLevelEnabled(minimumLogLevel);

  return pipe(
    transporters,
    RC.mapWithIndex((logType: LogTypes, transporter: LogTransporter) =>
      isEnabled(logType) ? transporter : silentTransporter
    )
  );
}
