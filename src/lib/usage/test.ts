/* globals describe, test, expect */
import formatUsage, { formatOptionError, resolveUsageSettings } from './index';

import { getRight } from '../../../tests/helpers';
import {
  dateOption,
  booleanOption,
  integerOption,
  OptionRegistry,
  enumStringOption,
  UnknownOptionError,
} from '../option-parser';

function resizeRegistry(): OptionRegistry {
  const registry = new OptionRegistry();

  getRight(
    registry.addOption(
      integerOption({
        shortName: 'w',
        longName: 'width',
        description: 'Width of images.',
        mandatory: true,
      })
    )
  );
  getRight(registry.addOption(integerOption({ shortName: 'h', longName: 'height' })));
  getRight(
    registry.addOption(
      enumStringOption({
        shortName: 'f',
        longName: 'format',
        description: 'Output format.',
        allowedValues: ['jpg', 'png'],
      })
    )
  );
  getRight(
    registry.addOption(
      booleanOption({
        shortName: 'v',
        longName: 'verbose',
        description: 'More output.',
        allowMany: true,
      })
    )
  );
  getRight(registry.addOption(dateOption({ shortName: 's', description: 'Start date.' })));
  getRight(registry.addOption(booleanOption({ shortName: 'x', hidden: true })));

  return registry;
}

const resizeUsageSettings = { appName: 'resize', suffixArgs: '<file> ...', locale: 'en' };

describe('Tests for the happy path', () => {
  test('Should ensure that the short usage lists every visible option on one line', () => {
    // Act
    const shortUsage = formatUsage(resizeRegistry(), false, resizeUsageSettings);

    // Assert
    expect(shortUsage).toBe(
      'Usage: resize -w <integer> [-h <integer>] [-f <string>] [-v] [-s <date>] <file> ...'
    );
  });

  test('Should ensure that the short usage can show long names and extra information', () => {
    // Act
    const shortUsage = formatUsage(resizeRegistry(), false, {
      ...resizeUsageSettings,
      showLongNamesInShortUsage: true,
      extraInfo: 'See the manual.',
    });

    // Assert
    expect(shortUsage).toBe(
      'Usage: resize -w,--width <integer> [-h,--height <integer>] [-f,--format <string>] [-v,--verbose] [-s <date>] <file> ...\nSee the manual.'
    );
  });

  test('Should ensure that the long usage describes each visible option', () => {
    // Act
    const longUsage = formatUsage(resizeRegistry(), true, resizeUsageSettings);

    // Assert
    expect(longUsage).toBe(
      [
        'Usage: resize <options> <file> ...',
        '',
        'Options:',
        '  -w,--width <integer>    (mandatory)',
        '      Width of images.',
        '',
        '  [-h,--height <integer>]',
        '',
        '  [-f,--format <string>]',
        '      Output format.',
        '      Allowed values: "jpg", "png"',
        '',
        '  [-v,--verbose]',
        '      More output.',
        '',
        '  [-s <date>]',
        '      Start date.',
        '      Date format: yyyy-MM-dd',
      ].join('\n')
    );
  });

  test('Should ensure that the long usage ends with the extra information', () => {
    // Arrange
    const registry = new OptionRegistry();
    getRight(registry.addOption(booleanOption({ shortName: 'q' })));

    // Act
    const longUsage = formatUsage(registry, true, { appName: 'tool', locale: 'en', extraInfo: 'Bye.' });

    // Assert
    expect(longUsage).toBe(['Usage: tool <options>', '', 'Options:', '  [-q]', '', 'Bye.'].join('\n'));
  });

  test('Should ensure that options hidden after registration are left out', () => {
    // Arrange
    const registry = resizeRegistry();
    getRight(registry.setHidden('height'));

    // Act
    const shortUsage = formatUsage(registry, false, resizeUsageSettings);

    // Assert
    expect(shortUsage).toBe('Usage: resize -w <integer> [-f <string>] [-v] [-s <date>] <file> ...');
  });

  test('Should ensure that the usage follows the locale', () => {
    // Act
    const shortUsage = formatUsage(resizeRegistry(), false, { appName: 'resize', locale: 'fr' });

    // Assert
    expect(shortUsage).toBe(
      'Utilisation : resize -w <entier> [-h <entier>] [-f <texte>] [-v] [-s <date>]'
    );
  });

  test('Should ensure that errors are rendered in the requested locale', () => {
    // Act & Assert
    expect(formatOptionError(new UnknownOptionError('x'), 'fr')).toBe('Option inconnue : x');
    expect(formatOptionError(new UnknownOptionError('x'), 'en')).toBe('Unknown option: x');
  });
});

describe('Tests for everything but the happy path', () => {
  test('Should ensure that an empty registry only prints the synopsis', () => {
    // Act
    const longUsage = formatUsage(new OptionRegistry(), true, { appName: 'tool', locale: 'en' });

    // Assert
    expect(longUsage).toBe('Usage: tool');
  });

  test('Should ensure that unset usage settings get defaults', () => {
    // Act
    const usageSettings = resolveUsageSettings({ locale: 'en' });

    // Assert
    expect(usageSettings).toMatchObject({
      suffixArgs: '',
      extraInfo: '',
      showLongNamesInShortUsage: false,
      locale: 'en',
    });
  });
});
