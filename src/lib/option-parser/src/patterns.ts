import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import OptionRegistry from './registry';

import { match, P } from 'ts-pattern';
import { not } from 'fp-ts/lib/Predicate';
import { partition } from 'ramda';
import { pipe } from 'fp-ts/lib/function';
import { ArgvToken, ARGV_TOKEN_TYPE, OptionDescriptor, RuleSet } from './types';
import {
  SOLITARY_HYPHEN,
  LONG_NAME_PATTERN,
  SHORT_NAME_PATTERN,
  END_OF_OPTIONS_MARKER,
} from './constants';

const CHARACTER_CLASS_METACHARACTERS_REGEX = /[\\\]\[^\-?*+.(){}|$\/]/g;

function escapeForCharacterClass(shortName: string): string {
  return shortName.replace(CHARACTER_CLASS_METACHARACTERS_REGEX, '\\$&');
}

function toCharacterClassBody(options: ReadonlyArray<OptionDescriptor>): string {
  return pipe(
    options,
    RA.map(({ shortName }) => escapeForCharacterClass(shortName)),
    RA.intercalate(S.Monoid)('')
  );
}

const toCharacterClass = (classBody: string): O.Option<string> =>
  pipe(
    classBody,
    O.fromPredicate(not(S.isEmpty)),
    O.map(nonEmptyClassBody => `[${nonEmptyClassBody}]`)
  );

/**
 * Builds the token-matching rules from the options currently registered.
 * Flags and value-taking options get separate character classes, so whether
 * `-abcvalue` is a cluster or a cluster followed by a value depends on the
 * registry at the time of compilation.
 */
export default function compilePatterns(registry: OptionRegistry): RuleSet {
  const [valueOptions, flagOptions] = partition(
    (option: OptionDescriptor) => option.requiresValue,
    [...registry.options()]
  );

  const flagCharacters = toCharacterClassBody(flagOptions);
  const valueOptionCharacters = toCharacterClassBody(valueOptions);

  const flagClass = toCharacterClass(flagCharacters);
  const valueOptionClass = toCharacterClass(valueOptionCharacters);

  return {
    flagCharacters,
    valueOptionCharacters,

    longOption: new RegExp(`^--(${LONG_NAME_PATTERN})(?:[=:](\\S+))?$`),

    flagCluster: pipe(
      flagClass,
      O.map(flags => new RegExp(`^[-/](${flags}+)$`))
    ),

    flagsThenValueOption: pipe(
      O.Do,
      O.apS('flags', flagClass),
      O.apS('values', valueOptionClass),
      O.map(({ flags, values }) => new RegExp(`^[-/](${flags}*)(${values})(?:[=:]?(\\S+))?$`))
    ),

    shortOption: new RegExp(`^[-/](${SHORT_NAME_PATTERN})(?:[=:]?(\\S+))?$`),
  };
}

function execRule(argvElement: string) {
  return (rule: RegExp): O.Option<RegExpExecArray> => O.fromNullable(rule.exec(argvElement));
}

const inlineValueOf = (capturedValue: string | undefined) => O.fromNullable(capturedValue);

// Rules are tried in priority order; anything unmatched is a non-option argument
export function tokenizeArgvElement(ruleSet: RuleSet) {
  return (argvElement: string): ArgvToken => {
    const execAgainst = execRule(argvElement);

    return match(argvElement)
      .with(SOLITARY_HYPHEN, (arg): ArgvToken => ({ tokenType: ARGV_TOKEN_TYPE.NON_OPTION, arg }))
      .with(END_OF_OPTIONS_MARKER, (): ArgvToken => ({ tokenType: ARGV_TOKEN_TYPE.END_OF_OPTIONS }))
      .with(P.string, (arg): ArgvToken =>
        pipe(
          execAgainst(ruleSet.longOption),
          O.map(
            ([, longName, value]): ArgvToken => ({
              tokenType: ARGV_TOKEN_TYPE.LONG_OPTION,
              longName,
              inlineValue: inlineValueOf(value),
            })
          ),

          O.alt(() =>
            pipe(
              ruleSet.flagCluster,
              O.chain(execAgainst),
              O.map(([, flags]): ArgvToken => ({ tokenType: ARGV_TOKEN_TYPE.FLAG_CLUSTER, flags }))
            )
          ),

          O.alt(() =>
            pipe(
              ruleSet.flagsThenValueOption,
              O.chain(execAgainst),
              O.map(
                ([, flags, shortName, value]): ArgvToken => ({
                  tokenType: ARGV_TOKEN_TYPE.FLAGS_THEN_VALUE_OPTION,
                  flags,
                  shortName,
                  inlineValue: inlineValueOf(value),
                })
              )
            )
          ),

          O.alt(() =>
            pipe(
              execAgainst(ruleSet.shortOption),
              O.map(
                ([, shortName, value]): ArgvToken => ({
                  tokenType: ARGV_TOKEN_TYPE.SHORT_OPTION,
                  shortName,
                  inlineValue: inlineValueOf(value),
                })
              )
            )
          ),

          O.getOrElse((): ArgvToken => ({ tokenType: ARGV_TOKEN_TYPE.NON_OPTION, arg }))
        )
      )
      .exhaustive();
  };
}
