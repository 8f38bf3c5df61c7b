/* globals describe, test, expect */
import * as O from 'fp-ts/lib/Option';

import scanArgv, { validateValueCounts } from './src/scanner';

import {
  RuleSet,
  booleanOption,
  integerOption,
  NotAFlagError,
  OptionRegistry,
  compilePatterns,
  InvalidCountError,
} from './index';

import { getLeft, getRight, quietEnglishSettings } from '../../../tests/helpers';

function flagAndSizeRegistry() {
  const registry = new OptionRegistry();

  const options = {
    a: getRight(registry.addOption(booleanOption({ shortName: 'a' }))),
    s: getRight(registry.addOption(integerOption({ shortName: 's' }))),
  };

  return { registry, options };
}

describe('Tests for the happy path', () => {
  test('Should ensure that scanning with compiled rules collects values and non-options', () => {
    // Arrange
    const { registry } = flagAndSizeRegistry();

    // Act
    const parseResult = getRight(
      scanArgv(registry, compilePatterns(registry), quietEnglishSettings)(['-as', '4', 'x'])
    );

    // Assert
    expect(parseResult.values.get('a')).toEqual([true]);
    expect(parseResult.values.get('s')).toEqual([4]);
    expect(parseResult.nonOptionArgs).toEqual(['x']);
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that a value option inside a flag cluster is rejected', () => {
    // Arrange
    const { registry, options } = flagAndSizeRegistry();

    const ruleSet: RuleSet = {
      ...compilePatterns(registry),
      flagCluster: O.some(/^[-/]([as]+)$/),
      flagsThenValueOption: O.none,
    };

    // Act
    const error = getLeft(scanArgv(registry, ruleSet, quietEnglishSettings)(['-as']));

    // Assert
    expect(error).toBeInstanceOf(NotAFlagError);
    expect(error).toMatchObject({ option: options.s, cluster: 'as' });
    expect(error.message).toBe(
      'Option -s requires a value and cannot be grouped with flags (found "as")'
    );
  });

  test('Should ensure that counts outside the declared bounds are reported after scanning', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(integerOption({ shortName: 'n', minCount: 2, maxCount: 3 })));

    const parseResult = getRight(
      scanArgv(registry, compilePatterns(registry), quietEnglishSettings)(['-n', '1'])
    );

    // Act
    const error = getLeft(validateValueCounts(registry)(parseResult));

    // Assert
    expect(error).toBeInstanceOf(InvalidCountError);
    expect(error.message).toBe('Option -n must be given between 2 and 3 times (found 1)');
  });
});
