import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import enCatalog from './locales/en.json';
import frCatalog from './locales/fr.json';

import { not } from 'fp-ts/lib/Predicate';
import { pipe } from 'fp-ts/lib/function';
import { LiteralUnion } from 'type-fest';

export type MessageCatalog = typeof enCatalog;
export type MessageKey = keyof MessageCatalog;
export type MessageArg = string | number | bigint;

// BCP 47 language tag, e.g. 'en', 'fr-CA'
export type Locale = LiteralUnion<'en' | 'fr', string>;

export const DEFAULT_LOCALE: Locale = 'en';

const catalogs: Readonly<Record<string, MessageCatalog>> = {
  en: enCatalog,
  fr: frCatalog,
};

const PLACEHOLDER_REGEX = /\{(\d+)\}/g;
const LIST_SEPARATOR = ',';

// 'fr_CA' -> ['fr-ca', 'fr']
function candidateCatalogTags(locale: Locale): ReadonlyArray<string> {
  const normalizedTag = pipe(locale, S.replace(/_/g, '-'), S.toLowerCase);
  const [languageSubtag] = normalizedTag.split('-');

  return [normalizedTag, languageSubtag];
}

export function resolveCatalog(locale: Locale): MessageCatalog {
  return pipe(
    candidateCatalogTags(locale),
    RA.findFirstMap(tag => O.fromNullable(catalogs[tag])),
    O.getOrElse(() => enCatalog)
  );
}

export function formatMessage(
  locale: Locale,
  messageKey: MessageKey,
  messageArgs: ReadonlyArray<MessageArg> = []
): string {
  const template = resolveCatalog(locale)[messageKey];

  return template.replace(PLACEHOLDER_REGEX, (placeholder, argIndex: string) =>
    pipe(
      messageArgs,
      RA.lookup(Number(argIndex)),
      O.map(String),
      O.getOrElse(() => placeholder)
    )
  );
}

export function messageList(locale: Locale, messageKey: MessageKey): string[] {
  return pipe(
    formatMessage(locale, messageKey).split(LIST_SEPARATOR),
    RA.map(S.trim),
    RA.filter(not(S.isEmpty)),
    RA.toArray
  );
}

export function isSupportedLocale(locale: Locale): boolean {
  return pipe(
    E.tryCatch(() => Intl.getCanonicalLocales(locale), E.toError),
    E.isRight
  );
}

// toLocaleLowerCase throws on malformed tags
export function toLocaleLowerCase(locale: Locale) {
  return (text: string): string =>
    isSupportedLocale(locale) ? text.toLocaleLowerCase(locale) : text.toLowerCase();
}
