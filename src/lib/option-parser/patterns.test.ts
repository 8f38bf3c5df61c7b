/* globals describe, test, expect */
import * as O from 'fp-ts/lib/Option';

import {
  booleanOption,
  integerOption,
  OptionRegistry,
  ARGV_TOKEN_TYPE,
  compilePatterns,
  tokenizeArgvElement,
} from './index';

import { getRight } from '../../../tests/helpers';

function registryWithFlagsAndSize() {
  const registry = new OptionRegistry();

  getRight(registry.addOption(booleanOption({ shortName: 'a' })));
  getRight(registry.addOption(booleanOption({ shortName: 'b' })));
  getRight(registry.addOption(booleanOption({ shortName: 'c' })));
  getRight(registry.addOption(integerOption({ shortName: 's', longName: 'size' })));

  return registry;
}

describe('Tests for rule compilation', () => {
  test('Should ensure that no cluster rules exist when nothing is registered', () => {
    // Act
    const ruleSet = compilePatterns(new OptionRegistry());

    // Assert
    expect(ruleSet.flagCluster).toEqual(O.none);
    expect(ruleSet.flagsThenValueOption).toEqual(O.none);
    expect(ruleSet.flagCharacters).toBe('');
    expect(ruleSet.valueOptionCharacters).toBe('');
  });

  test('Should ensure that the flags-then-value rule needs at least one value option', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(booleanOption({ shortName: 'a' })));

    // Act
    const ruleSet = compilePatterns(registry);

    // Assert
    expect(O.isSome(ruleSet.flagCluster)).toBe(true);
    expect(ruleSet.flagsThenValueOption).toEqual(O.none);
  });

  test('Should ensure that short names are partitioned and escaped into character classes', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(booleanOption({ shortName: 'a' })));
    getRight(registry.addOption(booleanOption({ shortName: '?' })));
    getRight(registry.addOption(integerOption({ shortName: 'n' })));

    // Act
    const { flagCharacters, valueOptionCharacters } = compilePatterns(registry);

    // Assert
    expect(flagCharacters).toBe('a\\?');
    expect(valueOptionCharacters).toBe('n');
  });
});

describe('Tests for argv element classification', () => {
  test.each([
    ['--size=10', { tokenType: ARGV_TOKEN_TYPE.LONG_OPTION, longName: 'size', inlineValue: O.some('10') }],
    ['--size', { tokenType: ARGV_TOKEN_TYPE.LONG_OPTION, longName: 'size', inlineValue: O.none }],
    ['-abc', { tokenType: ARGV_TOKEN_TYPE.FLAG_CLUSTER, flags: 'abc' }],
    ['/ab', { tokenType: ARGV_TOKEN_TYPE.FLAG_CLUSTER, flags: 'ab' }],
    [
      '-abs10',
      {
        tokenType: ARGV_TOKEN_TYPE.FLAGS_THEN_VALUE_OPTION,
        flags: 'ab',
        shortName: 's',
        inlineValue: O.some('10'),
      },
    ],
    [
      '-s',
      {
        tokenType: ARGV_TOKEN_TYPE.FLAGS_THEN_VALUE_OPTION,
        flags: '',
        shortName: 's',
        inlineValue: O.none,
      },
    ],
    ['-x=1', { tokenType: ARGV_TOKEN_TYPE.SHORT_OPTION, shortName: 'x', inlineValue: O.some('1') }],
    ['--', { tokenType: ARGV_TOKEN_TYPE.END_OF_OPTIONS }],
    ['-', { tokenType: ARGV_TOKEN_TYPE.NON_OPTION, arg: '-' }],
    ['--a', { tokenType: ARGV_TOKEN_TYPE.NON_OPTION, arg: '--a' }],
    ['image.png', { tokenType: ARGV_TOKEN_TYPE.NON_OPTION, arg: 'image.png' }],
  ])('Should ensure that "%s" is classified correctly', (argvElement, expectedToken) => {
    // Arrange
    const tokenize = tokenizeArgvElement(compilePatterns(registryWithFlagsAndSize()));

    // Act
    const token = tokenize(argvElement);

    // Assert
    expect(token).toEqual(expectedToken);
  });
});
