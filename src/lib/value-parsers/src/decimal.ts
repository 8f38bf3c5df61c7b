import * as O from 'fp-ts/lib/Option';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import { pipe } from 'fp-ts/lib/function';
import { DEFAULT_LOCALE, isSupportedLocale, Locale } from '../../messages';

const DECIMAL_LITERAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Formatting this sample exposes both separators of a locale
const SEPARATOR_PROBE = 12345.6;

interface NumberSeparators {
  readonly group: string;
  readonly decimal: string;
}

export function numberSeparatorsFor(locale: Locale): NumberSeparators {
  const formatLocale = isSupportedLocale(locale) ? locale : DEFAULT_LOCALE;
  const numberParts = new Intl.NumberFormat(formatLocale).formatToParts(SEPARATOR_PROBE);

  const separatorOfType = (partType: Intl.NumberFormatPartTypes, fallback: string) =>
    pipe(
      numberParts,
      RA.findFirst(({ type }) => type === partType),
      O.map(({ value }) => value),
      O.getOrElse(() => fallback)
    );

  return {
    group: separatorOfType('group', ','),
    decimal: separatorOfType('decimal', '.'),
  };
}

function normalizeDecimalLiteral(locale: Locale) {
  const { group, decimal } = numberSeparatorsFor(locale);
  return (rawValue: string) => rawValue.trim().split(group).join('').replace(decimal, '.');
}

export function parseDouble(rawValue: string, locale: Locale): O.Option<number> {
  return pipe(
    normalizeDecimalLiteral(locale)(rawValue),
    O.fromPredicate(literal => DECIMAL_LITERAL_REGEX.test(literal)),
    O.map(Number),
    O.filter(Number.isFinite)
  );
}

export function parseFloat32(rawValue: string, locale: Locale): O.Option<number> {
  return pipe(parseDouble(rawValue, locale), O.map(Math.fround), O.filter(Number.isFinite));
}
