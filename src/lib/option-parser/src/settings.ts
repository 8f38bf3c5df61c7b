import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as RA from 'fp-ts/lib/ReadonlyArray';
import * as D from 'io-ts/lib/Decoder';

import { not } from 'fp-ts/lib/Predicate';
import { flow, pipe } from 'fp-ts/lib/function';
import { ParserSettings } from './types';
import { createLogger, LogTypes } from '../../logger';
import { DEFAULT_LOCALE, isSupportedLocale, Locale } from '../../messages';

type Env = Readonly<Record<string, string | undefined>>;

// Checked in POSIX precedence order
export const LOCALE_ENV_VARS = ['LC_ALL', 'LC_MESSAGES', 'LANG'] as const;

export const LOG_LEVEL_ENV_VAR = 'OPTSMITH_LOG_LEVEL';

export const DEFAULT_LOG_LEVEL: LogTypes = 'WARN';

const NON_LANGUAGE_LOCALES: ReadonlyArray<string> = ['C', 'POSIX'];

const LogLevelDecoder: D.Decoder<unknown, LogTypes> = D.literal('DEBUG', 'INFO', 'WARN', 'ERROR');

export function getEnv(env: Env, varName: string): O.Option<string> {
  return pipe(O.fromNullable(env[varName]), O.filter(not(S.isEmpty)));
}

// 'fr_CA.UTF-8@euro' -> 'fr-CA'
export function toLanguageTag(posixLocale: string): O.Option<Locale> {
  return pipe(
    posixLocale,
    S.replace(/[.@].*$/, ''),
    S.replace(/_/g, '-'),
    O.fromPredicate(tag => !S.isEmpty(tag) && !NON_LANGUAGE_LOCALES.includes(tag)),
    O.filter(isSupportedLocale),
    O.chain(tag => RA.head(Intl.getCanonicalLocales(tag)))
  );
}

export function resolveLocale(env: Env = process.env): Locale {
  return pipe(
    LOCALE_ENV_VARS,
    RA.findFirstMap(varName => getEnv(env, varName)),
    O.chain(toLanguageTag),
    O.getOrElse(() => DEFAULT_LOCALE)
  );
}

export function resolveLogLevel(env: Env = process.env): LogTypes {
  return pipe(
    getEnv(env, LOG_LEVEL_ENV_VAR),
    O.map(S.toUpperCase),
    O.chain(flow(LogLevelDecoder.decode, O.fromEither)),
    O.getOrElse(() => DEFAULT_LOG_LEVEL)
  );
}

// Explicit settings win over the environment
export function resolveParserSettings(
  overrides: Partial<ParserSettings> = {},
  env: Env = process.env
): ParserSettings {
  return {
    locale: overrides.locale ?? resolveLocale(env),
    logger: overrides.logger ?? createLogger(resolveLogLevel(env)),
  };
}
