/* globals describe, test, expect */
import os from 'os';
import path from 'path';

import {
  dateOption,
  longOption,
  floatOption,
  stringOption,
  doubleOption,
  booleanOption,
  integerOption,
  newFileOption,
  enumStringOption,
  enumIntegerOption,
  IllegalValueError,
  OptionDeclaration,
  InvalidDeclarationError,
} from './index';

import { MessageKey } from '../messages';
import { getLeft, getRight } from '../../../tests/helpers';

describe('Tests for the happy path', () => {
  test('Should ensure that an option declared without arity is optional and single-valued', () => {
    // Act
    const width = getRight(integerOption({ shortName: 'w', longName: 'width' }));

    // Assert
    expect(width).toMatchObject({
      kind: 'integer',
      shortName: 'w',
      longName: 'width',
      requiresValue: true,
      minCount: 0,
      maxCount: 1,
      hidden: false,
      usageType: 'integer',
      allowedValues: [],
    });
  });

  test('Should ensure that the mandatory and allowMany shorthands set the count bounds', () => {
    // Act
    const sizes = getRight(integerOption({ shortName: 's', mandatory: true, allowMany: true }));

    // Assert
    expect(sizes).toMatchObject({ minCount: 1, maxCount: 100 });
  });

  test('Should ensure that boolean options take no value', () => {
    // Act
    const verbose = getRight(booleanOption({ shortName: 'v' }));

    // Assert
    expect(verbose.requiresValue).toBe(false);
  });

  test('Should ensure that each kind parses its raw values', () => {
    // Act & Assert
    expect(getRight(getRight(integerOption({ shortName: 'i' })).parseValue('42', 'en'))).toBe(42);

    expect(
      getRight(getRight(longOption({ shortName: 'l' })).parseValue('9223372036854775807', 'en'))
    ).toBe(BigInt('9223372036854775807'));

    expect(getRight(getRight(doubleOption({ shortName: 'd' })).parseValue('1,234.5', 'en'))).toBe(
      1234.5
    );

    expect(getRight(getRight(floatOption({ shortName: 'f' })).parseValue('0.1', 'en'))).toBe(
      Math.fround(0.1)
    );

    expect(getRight(getRight(dateOption({ shortName: 't' })).parseValue('2024-02-29', 'en'))).toEqual(
      new Date('2024-02-29T00:00:00.000Z')
    );

    expect(getRight(getRight(booleanOption({ shortName: 'b' })).parseValue('YES', 'en'))).toBe(true);

    expect(
      getRight(getRight(enumIntegerOption({ shortName: 'n', allowedValues: [1, 2] })).parseValue('2', 'en'))
    ).toBe(2);
  });

  test('Should ensure that a string option applies its filter', () => {
    // Arrange
    const code = getRight(stringOption({ shortName: 'c', filter: value => value.length <= 3 }));

    // Act
    const acceptedValue = getRight(code.parseValue('abc', 'en'));
    const error = getLeft(code.parseValue('abcd', 'en'));

    // Assert
    expect(acceptedValue).toBe('abc');
    expect(error).toBeInstanceOf(IllegalValueError);
    expect(error.message).toBe('Invalid value for option -c: abcd');
  });

  test('Should ensure that a new-file option accepts a path that does not exist yet', () => {
    // Arrange
    const output = getRight(newFileOption({ shortName: 'o' }));
    const missingPath = path.join(os.tmpdir(), 'optsmith-missing-dir', 'out.txt');

    // Act
    const parsedPath = getRight(output.parseValue(missingPath, 'en'));

    // Assert
    expect(parsedPath).toBe(missingPath);
    expect(output.usageType).toBe('path');
  });
});

describe('Tests for everything but the happy path', () => {
  test.each<[string, OptionDeclaration, MessageKey]>([
    ['a multi-character short name', { shortName: 'ab' }, 'decl.BadShortName'],
    ['a hyphen as short name', { shortName: '-' }, 'decl.BadShortName'],
    ['a one-character long name', { shortName: 'a', longName: 'x' }, 'decl.BadLongName'],
    ['a long name ending in a hyphen', { shortName: 'a', longName: 'all-' }, 'decl.BadLongName'],
    ['a negative minimum count', { shortName: 'a', minCount: -1, maxCount: 1 }, 'decl.BadMinCount'],
    ['a maximum below the minimum', { shortName: 'a', minCount: 3, maxCount: 2 }, 'decl.BadMaxCount'],
    ['a maximum above the limit', { shortName: 'a', minCount: 0, maxCount: 101 }, 'decl.BadMaxCount'],
  ])('Should ensure that %s is rejected', (_, declaration, expectedReasonKey) => {
    // Act
    const error = getLeft(integerOption(declaration));

    // Assert
    expect(error).toBeInstanceOf(InvalidDeclarationError);
    expect(error).toMatchObject({ reasonKey: expectedReasonKey });
  });

  test('Should ensure that the declaration error message names the reason', () => {
    // Act
    const error = getLeft(booleanOption({ shortName: 'ab' }));

    // Assert
    expect(error.message).toBe(
      'Invalid option declaration: short name "ab" must be a single character from [A-Za-z0-9@?]'
    );
  });

  test('Should ensure that an enumerated option needs allowed values', () => {
    // Act
    const error = getLeft(enumStringOption({ shortName: 'f', allowedValues: [] }));

    // Assert
    expect(error).toMatchObject({ reasonKey: 'decl.NoAllowedValues' });
  });
});
