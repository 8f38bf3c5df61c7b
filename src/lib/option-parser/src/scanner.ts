import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import OptionRegistry from './registry';

import { pipe, absurd } from 'fp-ts/lib/function';
import { tokenizeArgvElement } from './patterns';
import {
  OptionError,
  NotAFlagError,
  InvalidCountError,
  IllegalValueError,
  UnknownOptionError,
  ValueLimitExceededError,
  DuplicateSingleValueError,
} from './errors';
import {
  Argv,
  RuleSet,
  ArgvToken,
  OptionValue,
  ParseResult,
  ParserSettings,
  ARGV_TOKEN_TYPE,
  OptionDescriptor,
} from './types';

interface ScanState {
  readonly argvIndex: number;
  readonly endOfOptions: boolean;
  readonly collectedValues: ReadonlyMap<string, ReadonlyArray<OptionValue>>;
  readonly nonOptionArgs: ReadonlyArray<string>;
}

interface ScanContext {
  readonly argv: Argv;
  readonly registry: OptionRegistry;
  readonly settings: ParserSettings;
}

type ScanStep = (state: ScanState) => E.Either<OptionError, ScanState>;

const INITIAL_SCAN_STATE: ScanState = {
  argvIndex: 0,
  endOfOptions: false,
  collectedValues: new Map(),
  nonOptionArgs: [],
};

function advanceBy(indexIncrement: number) {
  return (state: ScanState): ScanState => ({
    ...state,
    argvIndex: state.argvIndex + indexIncrement,
  });
}

function addNonOptionArg(arg: string) {
  return (state: ScanState): ScanState => ({
    ...state,
    nonOptionArgs: RA.append(arg)(state.nonOptionArgs),
  });
}

function valuesCollectedFor(option: OptionDescriptor) {
  return (collectedValues: ScanState['collectedValues']): ReadonlyArray<OptionValue> =>
    collectedValues.get(option.shortName) ?? [];
}

function appendValue(option: OptionDescriptor, value: OptionValue): ScanStep {
  return state => {
    const existingValues = valuesCollectedFor(option)(state.collectedValues);

    if (option.maxCount === 1 && existingValues.length > 0) {
      return E.left(new DuplicateSingleValueError(option, value));
    }

    if (existingValues.length >= option.maxCount) {
      return E.left(new ValueLimitExceededError(option, value));
    }

    return E.right({
      ...state,
      collectedValues: new Map(state.collectedValues).set(
        option.shortName,
        RA.append(value)(existingValues)
      ),
    });
  };
}

function parseAndAppend(context: ScanContext, option: OptionDescriptor, rawValue: string): ScanStep {
  return state =>
    pipe(
      option.parseValue(rawValue, context.settings.locale),
      E.chainW(value => appendValue(option, value)(state))
    );
}

// Repeatable boolean options may carry an explicit value, e.g. --verbose=false
function acceptsInlineValue(option: OptionDescriptor, state: ScanState): boolean {
  const isRepeatableBelowLimit =
    option.maxCount > 1 &&
    valuesCollectedFor(option)(state.collectedValues).length < option.maxCount;

  return option.requiresValue || (option.kind === 'boolean' && isRepeatableBelowLimit);
}

// Expects the state to be positioned just past the option token
function assignOptionValue(
  context: ScanContext,
  option: OptionDescriptor,
  inlineValue: O.Option<string>
): ScanStep {
  return state =>
    pipe(
      inlineValue,
      O.match<string, E.Either<OptionError, ScanState>>(
        () => {
          if (!option.requiresValue) return appendValue(option, true)(state);

          return pipe(
            context.argv,
            RA.lookup(state.argvIndex),
            E.fromOption(() => new IllegalValueError(option)),
            E.chainW(rawValue => parseAndAppend(context, option, rawValue)(advanceBy(1)(state)))
          );
        },

        rawValue =>
          acceptsInlineValue(option, state)
            ? parseAndAppend(context, option, rawValue)(state)
            : E.left(new IllegalValueError(option, rawValue))
      )
    );
}

function resolveShortName(context: ScanContext, shortName: string) {
  return pipe(
    context.registry.lookupByShortName(shortName),
    E.fromOption(() => new UnknownOptionError(shortName))
  );
}

function setFlags(context: ScanContext, flags: string): ScanStep {
  const setFlag =
    (flag: string): ScanStep =>
    state =>
      pipe(
        resolveShortName(context, flag),
        E.filterOrElseW(
          option => !option.requiresValue,
          option => new NotAFlagError(option, flags)
        ),
        E.chainW(option => appendValue(option, true)(state))
      );

  return state =>
    pipe(
      flags.split(''),
      RA.reduce<string, E.Either<OptionError, ScanState>>(E.right(state), (scanOutcome, flag) =>
        pipe(scanOutcome, E.chain(setFlag(flag)))
      )
    );
}

function processToken(context: ScanContext, token: ArgvToken): ScanStep {
  return state => {
    const nextState = advanceBy(1)(state);

    switch (token.tokenType) {
      case ARGV_TOKEN_TYPE.NON_OPTION:
        return E.right(addNonOptionArg(token.arg)(nextState));

      case ARGV_TOKEN_TYPE.END_OF_OPTIONS:
        return E.right({ ...nextState, endOfOptions: true });

      case ARGV_TOKEN_TYPE.LONG_OPTION:
        return pipe(
          context.registry.lookupByLongName(token.longName),
          E.fromOption(() => new UnknownOptionError(token.longName)),
          E.chainW(option => assignOptionValue(context, option, token.inlineValue)(nextState))
        );

      case ARGV_TOKEN_TYPE.FLAG_CLUSTER:
        return setFlags(context, token.flags)(nextState);

      case ARGV_TOKEN_TYPE.FLAGS_THEN_VALUE_OPTION:
        return pipe(
          setFlags(context, token.flags)(nextState),
          E.chain(stateAfterFlags =>
            pipe(
              resolveShortName(context, token.shortName),
              E.chainW(option =>
                assignOptionValue(context, option, token.inlineValue)(stateAfterFlags)
              )
            )
          )
        );

      case ARGV_TOKEN_TYPE.SHORT_OPTION:
        return pipe(
          resolveShortName(context, token.shortName),
          E.chainW(option => assignOptionValue(context, option, token.inlineValue)(nextState))
        );

      default:
        return absurd(token);
    }
  };
}

function scanArgvElement(context: ScanContext, tokenize: (arg: string) => ArgvToken): ScanStep {
  return state => {
    const argvElement = context.argv[state.argvIndex];

    if (state.endOfOptions) {
      return E.right(pipe(state, addNonOptionArg(argvElement), advanceBy(1)));
    }

    const token = tokenize(argvElement);
    context.settings.logger.DEBUG(`Processing "${argvElement}" as ${token.tokenType}`)();

    return processToken(context, token)(state);
  };
}

/**
 * Walks argv once, from left to right. A value-taking option without an
 * inline value consumes the element that follows it, whatever it looks like.
 */
export default function scanArgv(
  registry: OptionRegistry,
  ruleSet: RuleSet,
  settings: ParserSettings
) {
  const tokenize = tokenizeArgvElement(ruleSet);

  return (argv: Argv): E.Either<OptionError, ParseResult> => {
    const scanStep = scanArgvElement({ argv, registry, settings }, tokenize);
    let scanOutcome: E.Either<OptionError, ScanState> = E.right(INITIAL_SCAN_STATE);

    while (E.isRight(scanOutcome) && scanOutcome.right.argvIndex < argv.length) {
      scanOutcome = scanStep(scanOutcome.right);
    }

    return pipe(
      scanOutcome,
      E.map(({ collectedValues, nonOptionArgs }) => ({
        values: collectedValues,
        nonOptionArgs,
      }))
    );
  };
}

function checkValueCount(
  option: OptionDescriptor,
  count: number
): E.Either<OptionError, OptionDescriptor> {
  if (option.minCount > 0 && count === 0) return E.left(new IllegalValueError(option));

  if (count < option.minCount || count > option.maxCount) {
    return E.left(new InvalidCountError(option, count));
  }

  return E.right(option);
}

// Checked in registration order, the first violation wins
export function validateValueCounts(registry: OptionRegistry) {
  return (parseResult: ParseResult): E.Either<OptionError, ParseResult> =>
    pipe(
      registry.options(),
      RA.traverse(E.Applicative)(option =>
        checkValueCount(option, valuesCollectedFor(option)(parseResult.values).length)
      ),
      E.map(() => parseResult)
    );
}
