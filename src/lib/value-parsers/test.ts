/* globals describe, test, expect, beforeAll, afterAll */
import * as O from 'fp-ts/lib/Option';

import os from 'os';
import path from 'path';
import fsExtra from 'fs-extra';

import {
  parseDouble,
  acceptsPath,
  parseBoolean,
  parseFloat32,
  parseInteger,
  parseIsoDate,
  formatIsoDate,
  matchEnumString,
  matchEnumInteger,
  parseLongInteger,
  numberSeparatorsFor,
} from './index';

describe('Tests for integer values', () => {
  test.each([
    ['42', O.some(42)],
    [' -7 ', O.some(-7)],
    ['+3', O.some(3)],
    ['2147483647', O.some(2147483647)],
    ['2147483648', O.none],
    ['4.2', O.none],
    ['', O.none],
  ])('Should ensure that "%s" parses as a 32-bit integer where it fits', (rawValue, expectedValue) => {
    // Act & Assert
    expect(parseInteger(rawValue)).toEqual(expectedValue);
  });

  test('Should ensure that long integers cover the 64-bit range only', () => {
    // Act & Assert
    expect(parseLongInteger('-9223372036854775808')).toEqual(O.some(BigInt('-9223372036854775808')));
    expect(parseLongInteger('9223372036854775808')).toEqual(O.none);
  });
});

describe('Tests for decimal values', () => {
  test.each([
    ['3.5', O.some(3.5)],
    ['1e3', O.some(1000)],
    ['.5', O.some(0.5)],
    ['1,234.5', O.some(1234.5)],
    ['abc', O.none],
    ['1e400', O.none],
  ])('Should ensure that "%s" parses under the English number format', (rawValue, expectedValue) => {
    // Act & Assert
    expect(parseDouble(rawValue, 'en')).toEqual(expectedValue);
  });

  test('Should ensure that the decimal separator follows the locale', () => {
    // Act & Assert
    expect(parseDouble('1,5', 'fr')).toEqual(O.some(1.5));
  });

  test('Should ensure that unknown locales fall back to English separators', () => {
    // Act & Assert
    expect(numberSeparatorsFor('not a locale!')).toEqual({ group: ',', decimal: '.' });
  });

  test('Should ensure that float values are rounded to single precision', () => {
    // Act & Assert
    expect(parseFloat32('0.1', 'en')).toEqual(O.some(Math.fround(0.1)));
    expect(parseFloat32('3.5e39', 'en')).toEqual(O.none);
  });
});

describe('Tests for boolean values', () => {
  test.each([
    ['on', 'en', O.some(true)],
    ['OFF', 'en', O.some(false)],
    ['y', 'en', O.some(true)],
    ['maybe', 'en', O.none],
    ['oui', 'fr', O.some(true)],
    ['non', 'fr', O.some(false)],
  ])('Should ensure that "%s" reads as the expected boolean in %s', (rawValue, locale, expectedValue) => {
    // Act & Assert
    expect(parseBoolean(rawValue, locale)).toEqual(expectedValue);
  });
});

describe('Tests for date values', () => {
  test('Should ensure that calendar dates parse to UTC midnight', () => {
    // Act & Assert
    expect(parseIsoDate('2024-02-29')).toEqual(O.some(new Date('2024-02-29T00:00:00.000Z')));
  });

  test('Should ensure that years below 100 are kept as written', () => {
    // Act
    const date = parseIsoDate('0099-01-01');

    // Assert
    expect(O.map((parsedDate: Date) => parsedDate.getUTCFullYear())(date)).toEqual(O.some(99));
  });

  test.each([['2023-02-29'], ['2024-13-01'], ['2024-1-01'], ['01/02/2024']])(
    'Should ensure that "%s" is rejected',
    rawValue => {
      // Act & Assert
      expect(parseIsoDate(rawValue)).toEqual(O.none);
    }
  );

  test('Should ensure that dates are formatted as yyyy-MM-dd', () => {
    // Act & Assert
    expect(formatIsoDate(new Date(Date.UTC(2024, 0, 5)))).toBe('2024-01-05');
  });
});

describe('Tests for enumerated values', () => {
  const imageFormats = ['jpg', 'jpeg', 'png'];

  test.each([
    ['PNG', O.some('png')],
    ['jpe', O.some('jpeg')],
    ['jp', O.none],
    ['gif', O.none],
  ])('Should ensure that "%s" resolves to a single allowed value', (rawValue, expectedValue) => {
    // Act & Assert
    expect(matchEnumString(imageFormats, true, 'en')(rawValue)).toEqual(expectedValue);
  });

  test('Should ensure that case-sensitive matching rejects other casings', () => {
    // Act & Assert
    expect(matchEnumString(imageFormats, false, 'en')('PNG')).toEqual(O.none);
  });

  test('Should ensure that an exact-case match breaks a tie', () => {
    // Act & Assert
    expect(matchEnumString(['Png', 'png'], true, 'en')('png')).toEqual(O.some('png'));
  });

  test('Should ensure that enumerated integers must be allowed', () => {
    // Arrange
    const matchLevel = matchEnumInteger([1, 2, 3]);

    // Act & Assert
    expect(matchLevel('2')).toEqual(O.some(2));
    expect(matchLevel('4')).toEqual(O.none);
  });
});

describe('Tests for path values', () => {
  let sandboxDir = '';
  let filePath = '';

  beforeAll(() => {
    sandboxDir = fsExtra.mkdtempSync(path.join(os.tmpdir(), 'optsmith-'));
    filePath = path.join(sandboxDir, 'a.txt');
    fsExtra.writeFileSync(filePath, 'test');
  });

  afterAll(() => {
    fsExtra.removeSync(sandboxDir);
  });

  test('Should ensure that existing files and directories are told apart', () => {
    // Act & Assert
    expect(acceptsPath({ existence: 'existing', fileType: 'file' })(filePath)).toBe(true);
    expect(acceptsPath({ existence: 'existing', fileType: 'directory' })(sandboxDir)).toBe(true);
    expect(acceptsPath({ existence: 'existing', fileType: 'file' })(sandboxDir)).toBe(false);
  });

  test('Should ensure that new paths must not exist yet', () => {
    // Arrange
    const acceptsNewPath = acceptsPath({ existence: 'new', fileType: 'any' });

    // Act & Assert
    expect(acceptsNewPath(filePath)).toBe(false);
    expect(acceptsNewPath(path.join(sandboxDir, 'b.txt'))).toBe(true);
  });

  test('Should ensure that unconstrained paths are always accepted', () => {
    // Act & Assert
    expect(acceptsPath({ existence: 'any', fileType: 'any' })(path.join(sandboxDir, 'missing'))).toBe(
      true
    );
  });
});
