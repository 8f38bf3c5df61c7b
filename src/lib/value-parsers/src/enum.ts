import * as O from 'fp-ts/lib/Option';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import { pipe } from 'fp-ts/lib/function';
import { parseInteger } from './integer';
import { Locale, toLocaleLowerCase } from '../../messages';

function exactlyOne<A>(candidates: ReadonlyArray<A>): O.Option<A> {
  return candidates.length === 1 ? RA.head(candidates) : O.none;
}

function containing(searchValue: string, normalize: (text: string) => string) {
  return (candidate: string) => normalize(candidate).includes(searchValue);
}

/**
 * Resolves input to one allowed value by substring containment. When the
 * first (possibly case-insensitive) pass leaves several candidates, only
 * those containing the input verbatim are kept. Anything but exactly one
 * survivor is a mismatch.
 */
export function matchEnumString(
  allowedValues: ReadonlyArray<string>,
  ignoreCase: boolean,
  locale: Locale
) {
  const normalize = ignoreCase ? toLocaleLowerCase(locale) : (text: string) => text;

  return (rawValue: string): O.Option<string> => {
    const candidates = pipe(
      allowedValues,
      RA.filter(containing(normalize(rawValue), normalize))
    );

    if (candidates.length <= 1) return exactlyOne(candidates);

    return pipe(
      candidates,
      RA.filter(candidate => candidate.includes(rawValue)),
      exactlyOne
    );
  };
}

export function matchEnumInteger(allowedValues: ReadonlyArray<number>) {
  return (rawValue: string): O.Option<number> =>
    pipe(
      parseInteger(rawValue),
      O.filter(value => allowedValues.includes(value))
    );
}
