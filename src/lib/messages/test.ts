/* globals describe, test, expect */
import {
  messageList,
  formatMessage,
  resolveCatalog,
  isSupportedLocale,
  toLocaleLowerCase,
} from './index';

describe('Tests for the happy path', () => {
  test('Should ensure that placeholders are replaced by position', () => {
    // Act
    const message = formatMessage('en', 'err.InvalidCount', ['-w', 1, 2, 3]);

    // Assert
    expect(message).toBe('Option -w must be given between 1 and 2 times (found 3)');
  });

  test.each([
    ['fr', 'Option inconnue : {0}'],
    ['fr_CA', 'Option inconnue : {0}'],
    ['FR-fr', 'Option inconnue : {0}'],
    ['de', 'Unknown option: {0}'],
  ])('Should ensure that the "%s" locale resolves to the expected catalog', (locale, expectedTemplate) => {
    // Act & Assert
    expect(resolveCatalog(locale)['err.UnknownOption']).toBe(expectedTemplate);
  });

  test('Should ensure that every catalog carries the same keys', () => {
    // Act
    const englishKeys = Object.keys(resolveCatalog('en')).sort();
    const frenchKeys = Object.keys(resolveCatalog('fr')).sort();

    // Assert
    expect(frenchKeys).toEqual(englishKeys);
  });

  test('Should ensure that list messages are split on commas', () => {
    // Act & Assert
    expect(messageList('en', 'boolean.true')).toEqual(['true', 't', 'yes', 'y', 'on', '1']);
  });

  test('Should ensure that lowercasing follows the locale', () => {
    // Act & Assert
    expect(toLocaleLowerCase('tr')('I')).toBe('ı');
    expect(toLocaleLowerCase('en')('I')).toBe('i');
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that placeholders without an argument are kept', () => {
    // Act & Assert
    expect(formatMessage('en', 'err.UnknownOption')).toBe('Unknown option: {0}');
  });

  test('Should ensure that malformed locales are reported and tolerated', () => {
    // Act & Assert
    expect(isSupportedLocale('en-US')).toBe(true);
    expect(isSupportedLocale('not a locale!')).toBe(false);
    expect(toLocaleLowerCase('not a locale!')('ABC')).toBe('abc');
  });
});
