import * as O from 'fp-ts/lib/Option';

import { pipe, constFalse, constTrue } from 'fp-ts/lib/function';
import { Locale, MessageKey, messageList, toLocaleLowerCase } from '../../messages';

function matchesWordList(locale: Locale, messageKey: MessageKey) {
  const words = messageList(locale, messageKey);
  return (normalizedValue: string) => words.includes(normalizedValue);
}

export function parseBoolean(rawValue: string, locale: Locale): O.Option<boolean> {
  const normalizedValue = toLocaleLowerCase(locale)(rawValue.trim());

  return pipe(
    O.some(normalizedValue),
    O.filter(matchesWordList(locale, 'boolean.true')),
    O.map(constTrue),
    O.alt(() =>
      pipe(
        O.some(normalizedValue),
        O.filter(matchesWordList(locale, 'boolean.false')),
        O.map(constFalse)
      )
    )
  );
}
