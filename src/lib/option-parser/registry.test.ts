/* globals describe, test, expect */
import * as O from 'fp-ts/lib/Option';

import {
  booleanOption,
  integerOption,
  OptionRegistry,
  DuplicateNameError,
  UnknownOptionError,
} from './index';

import { getLeft, getRight } from '../../../tests/helpers';

describe('Tests for the happy path', () => {
  test('Should ensure that a registered option can be found by either of its names', () => {
    // Arrange
    const registry = new OptionRegistry();

    // Act
    const all = getRight(registry.register(getRight(booleanOption({ shortName: 'a', longName: 'all' }))));

    // Assert
    expect(registry.lookupByShortName('a')).toEqual(O.some(all));
    expect(registry.lookupByLongName('all')).toEqual(O.some(all));
    expect(registry.lookup('all')).toEqual(O.some(all));
    expect(registry.lookupByShortName('z')).toEqual(O.none);
  });

  test('Should ensure that options are listed in registration order', () => {
    // Arrange
    const registry = new OptionRegistry();

    // Act
    const width = getRight(registry.addOption(integerOption({ shortName: 'w' })));
    const verbose = getRight(registry.addOption(booleanOption({ shortName: 'v' })));
    const height = getRight(registry.addOption(integerOption({ shortName: 'h' })));

    // Assert
    expect(registry.options()).toEqual([width, verbose, height]);
  });

  test.each([
    ['its short name', 'w'],
    ['its long name', 'width'],
  ])('Should ensure that an option can be unregistered by %s', (_, optionName) => {
    // Arrange
    const registry = new OptionRegistry();
    const width = getRight(registry.addOption(integerOption({ shortName: 'w', longName: 'width' })));

    // Act
    const removedOption = getRight(registry.unregister(optionName));

    // Assert
    expect(removedOption).toBe(width);
    expect(registry.options()).toEqual([]);
  });

  test('Should ensure that an option can be unregistered by its descriptor', () => {
    // Arrange
    const registry = new OptionRegistry();
    const width = getRight(registry.addOption(integerOption({ shortName: 'w' })));
    const verbose = getRight(registry.addOption(booleanOption({ shortName: 'v' })));

    // Act
    getRight(registry.unregister(width));

    // Assert
    expect(registry.options()).toEqual([verbose]);
  });

  test('Should ensure that hiding an option after registration is tracked by the registry', () => {
    // Arrange
    const registry = new OptionRegistry();
    const secret = getRight(registry.addOption(booleanOption({ shortName: 'x', longName: 'secret' })));
    const declaredHidden = getRight(registry.addOption(booleanOption({ shortName: 'y', hidden: true })));

    // Act
    getRight(registry.setHidden('secret'));

    // Assert
    expect(registry.isHidden(secret)).toBe(true);
    expect(registry.isHidden(declaredHidden)).toBe(true);
    expect(secret.hidden).toBe(false);
  });
});

describe('Tests for everything but the happy path', () => {
  test.each([
    ['short name', { shortName: 'a' }, 'a'],
    ['long name', { shortName: 'b', longName: 'all' }, 'all'],
  ])('Should ensure that a colliding %s is rejected', (_, declaration, collidingName) => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(booleanOption({ shortName: 'a', longName: 'all' })));

    // Act
    const error = getLeft(registry.addOption(booleanOption(declaration)));

    // Assert
    expect(error).toBeInstanceOf(DuplicateNameError);
    expect(error).toMatchObject({ optionName: collidingName });
    expect(registry.options()).toHaveLength(1);
  });

  test('Should ensure that unregistering or hiding an unknown option fails', () => {
    // Arrange
    const registry = new OptionRegistry();
    const stranger = getRight(booleanOption({ shortName: 's' }));

    // Act
    const unregisterByNameError = getLeft(registry.unregister('missing'));
    const unregisterByDescriptorError = getLeft(registry.unregister(stranger));
    const setHiddenError = getLeft(registry.setHidden('m'));

    // Assert
    expect(unregisterByNameError).toBeInstanceOf(UnknownOptionError);
    expect(unregisterByNameError).toMatchObject({ optionName: 'missing' });
    expect(unregisterByDescriptorError).toMatchObject({ optionName: 's' });
    expect(setHiddenError).toBeInstanceOf(UnknownOptionError);
  });
});
