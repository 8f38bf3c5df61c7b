/* globals describe, test, expect, beforeAll, afterAll */
import * as E from 'fp-ts/lib/Either';

import os from 'os';
import path from 'path';
import fsExtra from 'fs-extra';
import main from '../src/app/cli';

import { ExitCodes } from '../src/constants';
import { silentLogger } from '../src/lib/logger';
import { getCliVersion } from '../src/cmds/version';
import { quietEnglishSettings } from './helpers';

const quietEnglish = { parser: quietEnglishSettings };

const SHORT_USAGE =
  'Usage: optsmith-demo -w <integer> -h <integer> [-d <dir>] [-f <string>] [-v] [-@] [-?] <image> [<image>] ...';

describe('Tests for the happy path', () => {
  test('Should ensure that a valid command line is described', () => {
    // Act
    const cliOutcome = main(
      ['-w', '640', '-h', '480', '-vv', '-f', 'PNG', 'a.jpg', 'b.jpg'],
      quietEnglish
    )();

    // Assert
    expect(cliOutcome).toEqual({
      errors: [],
      warnings: [],
      output: [
        'Size: 640x480',
        'Format: png',
        `Directory: ${path.resolve('.')}`,
        'Verbosity: 2',
        'Images: a.jpg, b.jpg',
      ],
      exitCode: ExitCodes.OK,
    });
  });

  test('Should ensure that defaults are reported for options left out', () => {
    // Act
    const cliOutcome = main(['--width=1', '--height:2'], quietEnglish)();

    // Assert
    expect(cliOutcome.output).toEqual([
      'Size: 1x2',
      'Format: jpg',
      `Directory: ${path.resolve('.')}`,
      'Verbosity: 0',
      'Images: (none)',
    ]);
  });

  test.each([[[]], [['-w', '1', '-?']], [['--help']]])(
    'Should ensure that help is printed for %j',
    argv => {
      // Act
      const cliOutcome = main(argv, quietEnglish)();

      // Assert
      expect(cliOutcome.exitCode).toBe(ExitCodes.OK);
      expect(cliOutcome.output[0]).toStartWith(
        'Usage: optsmith-demo <options> <image> [<image>] ...\n\nOptions:\n  -w,--width <integer>    (mandatory)\n'
      );
    }
  );

  test('Should ensure that the version is printed', () => {
    // Act
    const cliOutcome = main(['--version'], quietEnglish)();

    // Assert
    expect(cliOutcome).toEqual({
      errors: [],
      warnings: [],
      output: ['v1.0.0'],
      exitCode: ExitCodes.OK,
    });
  });

  test('Should ensure that help tokens after the end-of-options marker are images', () => {
    // Act
    const cliOutcome = main(['-w', '1', '-h', '2', '--', '--help'], quietEnglish)();

    // Assert
    expect(cliOutcome.output).toContain('Images: --help');
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that a missing mandatory option exits with the short usage', () => {
    // Act
    const cliOutcome = main(['-w', '640'], quietEnglish)();

    // Assert
    expect(cliOutcome).toEqual({
      errors: ['Missing value for option -h,--height'],
      warnings: [],
      output: [SHORT_USAGE],
      exitCode: ExitCodes.USAGE,
    });
  });

  test.each([
    [['-w', '1', '-h', '2', '--format=gif'], 'Invalid value for option -f,--format: gif'],
    [['-w', '1', '-h', '2', '-z'], 'Unknown option: z'],
    [['-w', 'wide', '-h', '2'], 'Invalid value for option -w,--width: wide'],
  ])('Should ensure that %j is rejected', (argv, expectedError) => {
    // Act
    const cliOutcome = main(argv, quietEnglish)();

    // Assert
    expect(cliOutcome.errors).toEqual([expectedError]);
    expect(cliOutcome.exitCode).toBe(ExitCodes.USAGE);
  });

  test('Should ensure that errors follow the parser locale', () => {
    // Act
    const cliOutcome = main(['-w', '640'], { parser: { locale: 'fr', logger: silentLogger } })();

    // Assert
    expect(cliOutcome.errors).toEqual(["Valeur manquante pour l'option -h,--height"]);
  });

  describe('Version lookup', () => {
    let sandboxDir = '';

    beforeAll(() => {
      sandboxDir = fsExtra.mkdtempSync(path.join(os.tmpdir(), 'optsmith-version-'));
      fsExtra.writeJsonSync(path.join(sandboxDir, 'package.json'), { name: 'broken' });
    });

    afterAll(() => {
      fsExtra.removeSync(sandboxDir);
    });

    test('Should ensure that a package.json without a version is reported', () => {
      // Act
      const cliVersion = getCliVersion(sandboxDir)();

      // Assert
      expect(E.isLeft(cliVersion)).toBe(true);
    });
  });
});
