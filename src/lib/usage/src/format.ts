import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import path from 'path';

import { not } from 'fp-ts/lib/Predicate';
import { pipe } from 'fp-ts/lib/function';
import { DATE_FORMAT_PATTERN } from '../../value-parsers';
import { formatMessage, Locale } from '../../messages';
import {
  UsageType,
  OptionError,
  displayValue,
  OptionRegistry,
  resolveLocale,
  OptionDescriptor,
} from '../../option-parser';

export interface UsageSettings {
  readonly appName: string;
  readonly suffixArgs: string;
  readonly extraInfo: string;
  readonly showLongNamesInShortUsage: boolean;
  readonly locale: Locale;
}

const SIGNATURE_INDENT = '  ';
const DESCRIPTION_INDENT = '      ';
const MANDATORY_MARKER_GAP = '    ';
const FALLBACK_APP_NAME = 'app';

function defaultAppName(): string {
  return pipe(
    O.fromNullable(process.argv[1]),
    O.map(scriptPath => path.basename(scriptPath, path.extname(scriptPath))),
    O.filter(not(S.isEmpty)),
    O.getOrElse(() => FALLBACK_APP_NAME)
  );
}

export function resolveUsageSettings(overrides: Partial<UsageSettings> = {}): UsageSettings {
  return {
    appName: overrides.appName ?? defaultAppName(),
    suffixArgs: overrides.suffixArgs ?? '',
    extraInfo: overrides.extraInfo ?? '',
    showLongNamesInShortUsage: overrides.showLongNamesInShortUsage ?? false,
    locale: overrides.locale ?? resolveLocale(),
  };
}

function usageTypeKey(usageType: UsageType): `type.${UsageType}` {
  return `type.${usageType}`;
}

function optionSignature(option: OptionDescriptor, locale: Locale, withLongName: boolean): string {
  const names =
    withLongName && option.longName !== undefined
      ? `-${option.shortName},--${option.longName}`
      : `-${option.shortName}`;

  return option.requiresValue
    ? `${names} <${formatMessage(locale, usageTypeKey(option.usageType))}>`
    : names;
}

const isMandatory = (option: OptionDescriptor) => option.minCount > 0;

const joinNonEmpty = (separator: string) => (segments: ReadonlyArray<string>) =>
  pipe(segments, RA.filter(not(S.isEmpty)), RA.intercalate(S.Monoid)(separator));

function shortUsageEntry(settings: UsageSettings) {
  return (option: OptionDescriptor) => {
    const signature = optionSignature(option, settings.locale, settings.showLongNamesInShortUsage);
    return isMandatory(option) ? signature : `[${signature}]`;
  };
}

function formatAllowedValues(option: OptionDescriptor): string {
  return pipe(
    option.allowedValues,
    RA.map(value => (option.kind === 'enum-string' ? `"${displayValue(value)}"` : displayValue(value))),
    RA.intercalate(S.Monoid)(', ')
  );
}

function longUsageEntry(locale: Locale) {
  return (option: OptionDescriptor): ReadonlyArray<string> => {
    const signature = optionSignature(option, locale, true);

    const signatureLine = isMandatory(option)
      ? `${SIGNATURE_INDENT}${signature}${MANDATORY_MARKER_GAP}${formatMessage(locale, 'usage.mandatory')}`
      : `${SIGNATURE_INDENT}[${signature}]`;

    const descriptionLines = pipe(
      [
        option.description ?? '',
        RA.isNonEmpty(option.allowedValues)
          ? formatMessage(locale, 'usage.allowedValues', [formatAllowedValues(option)])
          : '',
        option.kind === 'date' ? formatMessage(locale, 'usage.dateFormat', [DATE_FORMAT_PATTERN]) : '',
      ],
      RA.filter(not(S.isEmpty)),
      RA.map(line => `${DESCRIPTION_INDENT}${line}`)
    );

    return [signatureLine, ...descriptionLines, ''];
  };
}

function formatShortUsage(options: ReadonlyArray<OptionDescriptor>, settings: UsageSettings) {
  const usageLine = joinNonEmpty(' ')([
    formatMessage(settings.locale, 'usage.heading'),
    settings.appName,
    ...pipe(options, RA.map(shortUsageEntry(settings))),
    settings.suffixArgs,
  ]);

  return joinNonEmpty('\n')([usageLine, settings.extraInfo]);
}

function formatLongUsage(options: ReadonlyArray<OptionDescriptor>, settings: UsageSettings) {
  const { locale } = settings;

  const usageLine = joinNonEmpty(' ')([
    formatMessage(locale, 'usage.heading'),
    settings.appName,
    RA.isNonEmpty(options) ? formatMessage(locale, 'usage.optionsPlaceholder') : '',
    settings.suffixArgs,
  ]);

  const optionLines = RA.isNonEmpty(options)
    ? ['', formatMessage(locale, 'usage.options'), ...pipe(options, RA.chain(longUsageEntry(locale)))]
    : [];

  return pipe(
    [usageLine, ...optionLines, settings.extraInfo].join('\n'),
    S.trimRight
  );
}

/**
 * Short usage is a single synopsis line; long usage adds one block per option.
 * Hidden options appear in neither.
 */
export default function formatUsage(
  registry: OptionRegistry,
  longUsage: boolean,
  settingsOverrides: Partial<UsageSettings> = {}
): string {
  const settings = resolveUsageSettings(settingsOverrides);

  const visibleOptions = pipe(
    registry.options(),
    RA.filter(option => !registry.isHidden(option))
  );

  return longUsage
    ? formatLongUsage(visibleOptions, settings)
    : formatShortUsage(visibleOptions, settings);
}

export function formatOptionError(error: OptionError, locale: Locale = resolveLocale()): string {
  return error.localizedMessage(locale);
}
