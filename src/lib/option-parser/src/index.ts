import * as E from 'fp-ts/lib/Either';
import * as IO from 'fp-ts/lib/IO';

import OptionRegistry from './registry';
import compilePatterns from './patterns';
import scanArgv, { validateValueCounts } from './scanner';

import { pipe } from 'fp-ts/lib/function';
import { Logger } from '../../logger';
import { OptionError } from './errors';
import { resolveParserSettings } from './settings';
import { Argv, ParseResult, ParserSettings, RuleSet } from './types';

function logRuleSet(logger: Logger) {
  return ({ flagCharacters, valueOptionCharacters }: RuleSet) =>
    logger.DEBUG(
      `Character classes for flags and value options: [${flagCharacters}], [${valueOptionCharacters}]`
    );
}

/**
 * Patterns are compiled from the registry on every run, so options added or
 * removed between runs are picked up. Each run collects into a fresh result.
 */
export default function optionParser(
  registry: OptionRegistry,
  settingsOverrides: Partial<ParserSettings> = {}
) {
  const settings = resolveParserSettings(settingsOverrides);
  const { logger } = settings;

  return (argv: Argv): E.Either<OptionError, ParseResult> =>
    pipe(
      logger.DEBUG(`Parsing ${JSON.stringify(argv)}`),
      IO.map(() => compilePatterns(registry)),
      IO.chainFirst(logRuleSet(logger)),
      IO.map(ruleSet =>
        pipe(argv, scanArgv(registry, ruleSet, settings), E.chain(validateValueCounts(registry)))
      )
    )();
}
