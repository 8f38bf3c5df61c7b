/* globals describe, test, expect */
import optionParser, {
  valuesOf,
  booleanOption,
  integerOption,
  stringOption,
  OptionRegistry,
  NotAFlagError,
  enumStringOption,
  IllegalValueError,
  InvalidCountError,
  UnknownOptionError,
  nonOptionArguments,
  ValueLimitExceededError,
  DuplicateSingleValueError,
} from './index';

import { getLeft, getRight, quietEnglishSettings } from '../../../tests/helpers';

function flagsAndSizeRegistry() {
  const registry = new OptionRegistry();

  const options = {
    a: getRight(registry.addOption(booleanOption({ shortName: 'a', longName: 'all' }))),
    b: getRight(registry.addOption(booleanOption({ shortName: 'b' }))),
    c: getRight(registry.addOption(booleanOption({ shortName: 'c' }))),
    s: getRight(registry.addOption(integerOption({ shortName: 's', longName: 'size' }))),
  };

  return { registry, options };
}

describe('Tests for the happy path', () => {
  test('Should ensure that separate flags and a clustered flag group parse the same', () => {
    // Arrange
    const { registry, options } = flagsAndSizeRegistry();
    const parse = optionParser(registry, quietEnglishSettings);

    // Act
    const separateFlagsResult = getRight(parse(['-a', '-b', '-c']));
    const clusteredFlagsResult = getRight(parse(['-abc']));

    // Assert
    [separateFlagsResult, clusteredFlagsResult].forEach(parseResult => {
      expect(valuesOf(parseResult, options.a)).toEqual([true]);
      expect(valuesOf(parseResult, options.b)).toEqual([true]);
      expect(valuesOf(parseResult, options.c)).toEqual([true]);
      expect(valuesOf(parseResult, options.s)).toEqual([]);
    });
  });

  test.each([
    ['value as next token', ['-s', '10']],
    ['colon delimiter', ['-s:10']],
    ['equals delimiter', ['-s=10']],
    ['appended value', ['-s10']],
    ['slash prefix', ['/s', '10']],
    ['long option with equals delimiter', ['--size=10']],
    ['long option with colon delimiter', ['--size:10']],
    ['long option with value as next token', ['--size', '10']],
  ])('Should ensure that an integer option value is read with %s', (_, argv) => {
    // Arrange
    const { registry, options } = flagsAndSizeRegistry();

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(argv));

    // Assert
    expect(valuesOf(parseResult, options.s)).toEqual([10]);
    expect(nonOptionArguments(parseResult)).toEqual([]);
  });

  test('Should ensure that leading flags and a trailing value option can share a token', () => {
    // Arrange
    const { registry, options } = flagsAndSizeRegistry();

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(['-abcs10']));

    // Assert
    expect(valuesOf(parseResult, options.a)).toEqual([true]);
    expect(valuesOf(parseResult, options.b)).toEqual([true]);
    expect(valuesOf(parseResult, options.c)).toEqual([true]);
    expect(valuesOf(parseResult, options.s)).toEqual([10]);
  });

  test('Should ensure that everything after the end-of-options marker is a non-option argument', () => {
    // Arrange
    const registry = new OptionRegistry();
    const a = getRight(registry.addOption(booleanOption({ shortName: 'a' })));

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(['-a', '--', '-b']));

    // Assert
    expect(valuesOf(parseResult, a)).toEqual([true]);
    expect(nonOptionArguments(parseResult)).toEqual(['-b']);
  });

  test('Should ensure that a mandatory option, a repeated flag and a free argument are collected', () => {
    // Arrange
    const registry = new OptionRegistry();
    const w = getRight(registry.addOption(integerOption({ shortName: 'w', mandatory: true })));
    const v = getRight(registry.addOption(booleanOption({ shortName: 'v', allowMany: true })));

    // Act
    const parseResult = getRight(
      optionParser(registry, quietEnglishSettings)(['-w', '5', '-vv', 'extra'])
    );

    // Assert
    expect(valuesOf(parseResult, w)).toEqual([5]);
    expect(valuesOf(parseResult, v)).toEqual([true, true]);
    expect(nonOptionArguments(parseResult)).toEqual(['extra']);
  });

  test('Should ensure that a solitary hyphen is a non-option argument even without declared options', () => {
    // Act
    const parseResult = getRight(optionParser(new OptionRegistry(), quietEnglishSettings)(['-']));

    // Assert
    expect(nonOptionArguments(parseResult)).toEqual(['-']);
  });

  test('Should ensure that a value option consumes the next token even when it looks like an option', () => {
    // Arrange
    const registry = new OptionRegistry();
    const a = getRight(registry.addOption(booleanOption({ shortName: 'a' })));
    const n = getRight(registry.addOption(stringOption({ shortName: 'n', longName: 'name' })));

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(['--name', '-a']));

    // Assert
    expect(valuesOf(parseResult, n)).toEqual(['-a']);
    expect(valuesOf(parseResult, a)).toEqual([]);
  });

  test('Should ensure that a repeatable flag accepts an explicit inline value', () => {
    // Arrange
    const registry = new OptionRegistry();
    const v = getRight(
      registry.addOption(booleanOption({ shortName: 'v', longName: 'verbose', allowMany: true }))
    );

    // Act
    const parseResult = getRight(
      optionParser(registry, quietEnglishSettings)(['--verbose=off', '-v'])
    );

    // Assert
    expect(valuesOf(parseResult, v)).toEqual([false, true]);
  });

  test('Should ensure that short names which are regex metacharacters can be clustered', () => {
    // Arrange
    const registry = new OptionRegistry();
    const help = getRight(registry.addOption(booleanOption({ shortName: '?' })));
    const version = getRight(registry.addOption(booleanOption({ shortName: '@' })));

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(['-?@']));

    // Assert
    expect(valuesOf(parseResult, help)).toEqual([true]);
    expect(valuesOf(parseResult, version)).toEqual([true]);
  });

  test('Should ensure that enumerated values are matched regardless of case', () => {
    // Arrange
    const registry = new OptionRegistry();
    const format = getRight(
      registry.addOption(enumStringOption({ shortName: 'f', allowedValues: ['jpg', 'png'] }))
    );

    // Act
    const parseResult = getRight(optionParser(registry, quietEnglishSettings)(['-f', 'PNG']));

    // Assert
    expect(valuesOf(parseResult, format)).toEqual(['png']);
  });

  test('Should ensure that each run of the same parser produces a fresh result', () => {
    // Arrange
    const { registry, options } = flagsAndSizeRegistry();
    const parse = optionParser(registry, quietEnglishSettings);

    // Act
    const firstResult = getRight(parse(['-s', '1']));
    const secondResult = getRight(parse(['-s', '2', 'free']));

    // Assert
    expect(valuesOf(firstResult, options.s)).toEqual([1]);
    expect(nonOptionArguments(firstResult)).toEqual([]);
    expect(valuesOf(secondResult, options.s)).toEqual([2]);
    expect(nonOptionArguments(secondResult)).toEqual(['free']);
  });

  test('Should ensure that options registered after the parser is created are recognised', () => {
    // Arrange
    const registry = new OptionRegistry();
    const parse = optionParser(registry, quietEnglishSettings);
    const late = getRight(registry.addOption(booleanOption({ shortName: 'l', longName: 'late' })));

    // Act
    const parseResult = getRight(parse(['--late']));

    // Assert
    expect(valuesOf(parseResult, late)).toEqual([true]);
  });

  // Option elements, values they consumed from the next element, collected values, non-options
  test.each<[ReadonlyArray<string>, number, number, number, ReadonlyArray<string>]>([
    [['-a', '-s', '10', 'x', '-bc', 'y'], 3, 1, 4, ['x', 'y']],
    [['/s:3', '-c', 'z'], 2, 0, 2, ['z']],
    [['x', '--size', '7', '-bc', 'y', 'z'], 2, 1, 3, ['x', 'y', 'z']],
    [['-bs12', 'w'], 1, 0, 2, ['w']],
  ])(
    'Should ensure that every element of %j is an option, a consumed value or a non-option argument',
    (argv, optionElements, consumedValues, collectedValueCount, expectedNonOptionArgs) => {
      // Arrange
      const { registry, options } = flagsAndSizeRegistry();

      // Act
      const parseResult = getRight(optionParser(registry, quietEnglishSettings)(argv));
      const nonOptionArgs = nonOptionArguments(parseResult);

      const valueCount =
        valuesOf(parseResult, options.a).length +
        valuesOf(parseResult, options.b).length +
        valuesOf(parseResult, options.c).length +
        valuesOf(parseResult, options.s).length;

      // Assert
      expect(valueCount).toBe(collectedValueCount);
      expect(nonOptionArgs).toEqual(expectedNonOptionArgs);
      expect(optionElements + consumedValues + nonOptionArgs.length).toBe(argv.length);
    }
  );
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that an undeclared long option is reported by name', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['--bogus']));

    // Assert
    expect(error).toBeInstanceOf(UnknownOptionError);
    expect(error).toMatchObject({ optionName: 'bogus' });
    expect(error.message).toBe('Unknown option: bogus');
  });

  test('Should ensure that an undeclared short option is reported by name', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-x']));

    // Assert
    expect(error).toBeInstanceOf(UnknownOptionError);
    expect(error).toMatchObject({ optionName: 'x' });
  });

  test('Should ensure that a missing mandatory option fails the parse and names the option', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(integerOption({ shortName: 'w', longName: 'width', mandatory: true })));

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)([]));

    // Assert
    expect(error).toBeInstanceOf(IllegalValueError);
    expect(error.message).toBe('Missing value for option -w,--width');
  });

  test('Should ensure that a second value for a single-value option is rejected', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-s', '1', '-s', '2']));

    // Assert
    expect(error).toBeInstanceOf(DuplicateSingleValueError);
    expect(error).toMatchObject({ value: 2 });
    expect(error.message).toBe('Option -s,--size accepts a single value (extra value: 2)');
  });

  test('Should ensure that a repeated flag without repeats allowed is rejected', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-aa']));

    // Assert
    expect(error).toBeInstanceOf(DuplicateSingleValueError);
  });

  test('Should ensure that values beyond the maximum count are rejected', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(integerOption({ shortName: 'n', minCount: 0, maxCount: 2 })));

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-n1', '-n2', '-n3']));

    // Assert
    expect(error).toBeInstanceOf(ValueLimitExceededError);
    expect(error.message).toBe('Too many values for option -n (at most 2)');
  });

  test('Should ensure that too few occurrences of an option are reported with the count found', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(integerOption({ shortName: 'n', minCount: 2, maxCount: 3 })));

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-n', '1']));

    // Assert
    expect(error).toBeInstanceOf(InvalidCountError);
    expect(error).toMatchObject({ count: 1 });
    expect(error.message).toBe('Option -n must be given between 2 and 3 times (found 1)');
  });

  test.each([
    ['a value that is not a number', ['-s', 'ten'], 'ten'],
    ['an inline value on a single-use flag', ['--all=yes'], 'yes'],
  ])('Should ensure that %s is an illegal value', (_, argv, expectedRawValue) => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(argv));

    // Assert
    expect(error).toBeInstanceOf(IllegalValueError);
    expect(error).toMatchObject({ rawValue: expectedRawValue });
  });

  test('Should ensure that a value option at the end of argv without a value is rejected', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['-s']));

    // Assert
    expect(error).toBeInstanceOf(IllegalValueError);
    expect(error.message).toBe('Missing value for option -s,--size');
  });

  test('Should ensure that errors render in the locale they are asked for', () => {
    // Arrange
    const { registry } = flagsAndSizeRegistry();

    // Act
    const error = getLeft(optionParser(registry, quietEnglishSettings)(['--bogus']));

    // Assert
    expect(error.localizedMessage('fr')).toBe('Option inconnue : bogus');
    expect(error).not.toBeInstanceOf(NotAFlagError);
  });
});
