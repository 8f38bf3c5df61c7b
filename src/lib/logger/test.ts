/* globals describe, test, expect, jest, afterEach */
import chalk from 'chalk';

import {
  Logger,
  LogTypes,
  silentLogger,
  createLogger,
  LogTransporter,
  isLogLevelEnabled,
  customConsoleTransporters,
} from './index';

function recordingTransporters() {
  const recordedMessages: string[] = [];

  const recordAs =
    (logType: LogTypes): LogTransporter =>
    message =>
    () => {
      recordedMessages.push(`${logType} ${message}`);
    };

  const transporters: Logger = {
    DEBUG: recordAs('DEBUG'),
    INFO: recordAs('INFO'),
    WARN: recordAs('WARN'),
    ERROR: recordAs('ERROR'),
  };

  return { recordedMessages, transporters };
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Tests for the happy path', () => {
  test('Should ensure that messages below the minimum level are dropped', () => {
    // Arrange
    const { recordedMessages, transporters } = recordingTransporters();
    const logger = createLogger('WARN', transporters);

    // Act
    logger.DEBUG('parsing')();
    logger.INFO('parsed')();
    logger.WARN('careful')();
    logger.ERROR('failed')();

    // Assert
    expect(recordedMessages).toEqual(['WARN careful', 'ERROR failed']);
  });

  test.each<[LogTypes, LogTypes, boolean]>([
    ['DEBUG', 'DEBUG', true],
    ['INFO', 'DEBUG', false],
    ['INFO', 'ERROR', true],
    ['ERROR', 'WARN', false],
  ])('Should ensure that with minimum %s, %s messages are enabled: %s', (minimumLevel, logType, expected) => {
    // Act & Assert
    expect(isLogLevelEnabled(minimumLevel)(logType)).toBe(expected);
  });

  test('Should ensure that console transporters prefix the level', () => {
    // Arrange
    const consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    // Act
    customConsoleTransporters.WARN('careful')();

    // Assert
    expect(consoleWarnSpy).toHaveBeenCalledWith(`${chalk.yellowBright.bold('WARNING: ')}careful`);
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that the silent logger writes nothing', () => {
    // Arrange
    const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    // Act
    silentLogger.ERROR('failed')();

    // Assert
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  test('Should ensure that logging is deferred until the IO runs', () => {
    // Arrange
    const { recordedMessages, transporters } = recordingTransporters();

    // Act
    createLogger('DEBUG', transporters).INFO('later');

    // Assert
    expect(recordedMessages).toEqual([]);
  });
});
