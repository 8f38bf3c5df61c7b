/* globals describe, test, expect */
import * as O from 'fp-ts/lib/Option';

import path from 'path';
import optionParser, {
  valueOf,
  valuesOf,
  isFlagSet,
  fileValuesOf,
  optionByName,
  valuesByName,
  fileOption,
  stringOption,
  booleanOption,
  integerOption,
  valueOrDefault,
  OptionRegistry,
  enumStringOption,
  IllegalValueError,
  UnknownOptionError,
  nonOptionArguments,
  parsedSolitaryHyphen,
  InvalidRetrievalError,
  InvalidOptionTypeError,
} from './index';

import { getLeft, getRight, quietEnglishSettings } from '../../../tests/helpers';

function parsedSample() {
  const registry = new OptionRegistry();

  const options = {
    width: getRight(registry.addOption(integerOption({ shortName: 'w', longName: 'width' }))),
    tags: getRight(registry.addOption(stringOption({ shortName: 't', longName: 'tags', allowMany: true }))),
    format: getRight(
      registry.addOption(enumStringOption({ shortName: 'f', allowedValues: ['jpg', 'png'] }))
    ),
    verbose: getRight(registry.addOption(booleanOption({ shortName: 'v' }))),
    quiet: getRight(registry.addOption(booleanOption({ shortName: 'q' }))),
    input: getRight(registry.addOption(fileOption({ shortName: 'p' }))),
  };

  const parseResult = getRight(
    optionParser(registry, quietEnglishSettings)([
      '-w',
      '3',
      '-t',
      'x',
      '-t',
      'y',
      '-v',
      '-p',
      'some/file.txt',
      '-',
    ])
  );

  return { registry, options, parseResult };
}

describe('Tests for the happy path', () => {
  test('Should ensure that collected values can be read back per option', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act & Assert
    expect(valuesOf(parseResult, options.tags)).toEqual(['x', 'y']);
    expect(getRight(valueOf(parseResult, options.width))).toEqual(O.some(3));
    expect(getRight(valueOf(parseResult, options.format))).toEqual(O.none);
  });

  test('Should ensure that defaults are used only when no value was given', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act & Assert
    expect(getRight(valueOrDefault(parseResult, options.format, 'png'))).toBe('png');
    expect(getRight(valueOrDefault(parseResult, options.width, 10))).toBe(3);
  });

  test('Should ensure that flags read as set only when given', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act & Assert
    expect(isFlagSet(parseResult, options.verbose)).toBe(true);
    expect(isFlagSet(parseResult, options.quiet)).toBe(false);
  });

  test('Should ensure that file values are resolved to absolute paths', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act
    const filePaths = fileValuesOf(parseResult, options.input);

    // Assert
    expect(filePaths).toEqual([path.resolve('some/file.txt')]);
  });

  test('Should ensure that a solitary hyphen is reported as parsed', () => {
    // Arrange
    const { parseResult } = parsedSample();

    // Act & Assert
    expect(parsedSolitaryHyphen(parseResult)).toBe(true);
    expect(nonOptionArguments(parseResult)).toEqual(['-']);
  });

  test.each([['width'], ['w']])('Should ensure that options can be retrieved by the name "%s"', optionName => {
    // Arrange
    const { registry, options, parseResult } = parsedSample();

    // Act
    const width = getRight(optionByName(registry, optionName, 'integer'));
    const widthValues = getRight(valuesByName(registry, parseResult, optionName, 'integer'));

    // Assert
    expect(width).toBe(options.width);
    expect(widthValues).toEqual([3]);
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that a single value cannot be read from a repeatable option', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act
    const error = getLeft(valueOf(parseResult, options.tags));

    // Assert
    expect(error).toBeInstanceOf(InvalidRetrievalError);
    expect(error.message).toBe('Option -t,--tags accepts several values, retrieve them as a list');
  });

  test('Should ensure that an enumerated default must be an allowed value', () => {
    // Arrange
    const { options, parseResult } = parsedSample();

    // Act
    const error = getLeft(valueOrDefault(parseResult, options.format, 'gif'));

    // Assert
    expect(error).toBeInstanceOf(IllegalValueError);
    expect(error).toMatchObject({ rawValue: 'gif' });
  });

  test('Should ensure that lookups by name check existence and kind', () => {
    // Arrange
    const { registry } = parsedSample();

    // Act
    const wrongKindError = getLeft(optionByName(registry, 'width', 'string'));
    const unknownNameError = getLeft(optionByName(registry, 'height', 'integer'));

    // Assert
    expect(wrongKindError).toBeInstanceOf(InvalidOptionTypeError);
    expect(wrongKindError.message).toBe('Option width is not of kind string');
    expect(unknownNameError).toBeInstanceOf(UnknownOptionError);
  });
});
