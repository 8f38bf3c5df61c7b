import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import path from 'path';
import OptionRegistry from './registry';

import { not } from 'fp-ts/lib/Predicate';
import { pipe, constFalse } from 'fp-ts/lib/function';
import { SOLITARY_HYPHEN } from './constants';
import { OptionDescriptor, OptionKind, ParseResult, ValueOf } from './types';
import {
  displayValue,
  IllegalValueError,
  UnknownOptionError,
  InvalidRetrievalError,
  InvalidOptionTypeError,
} from './errors';

export function allowsMany(option: OptionDescriptor): boolean {
  return option.maxCount > 1;
}

export function hasKind<K extends OptionKind>(kind: K) {
  return (option: OptionDescriptor): option is OptionDescriptor<K> => option.kind === kind;
}

export function valuesOf<K extends OptionKind>(
  parseResult: ParseResult,
  option: OptionDescriptor<K>
): ReadonlyArray<ValueOf<K>> {
  return pipe(parseResult.values.get(option.shortName) ?? [], RA.filter(option.isValue));
}

export function nonOptionArguments(parseResult: ParseResult): ReadonlyArray<string> {
  return parseResult.nonOptionArgs;
}

export function valueOf<K extends OptionKind>(
  parseResult: ParseResult,
  option: OptionDescriptor<K>
): E.Either<InvalidRetrievalError, O.Option<ValueOf<K>>> {
  return pipe(
    option,
    E.fromPredicate(not(allowsMany), () => new InvalidRetrievalError(option)),
    E.map(() => pipe(valuesOf(parseResult, option), RA.head))
  );
}

// For enumerated options the default must itself be one of the allowed values
export function valueOrDefault<K extends OptionKind>(
  parseResult: ParseResult,
  option: OptionDescriptor<K>,
  defaultValue: ValueOf<K>
): E.Either<IllegalValueError | InvalidRetrievalError, ValueOf<K>> {
  const isAllowedDefault =
    RA.isEmpty(option.allowedValues) || option.allowedValues.includes(defaultValue);

  return pipe(
    option,
    E.fromPredicate(
      () => isAllowedDefault,
      () => new IllegalValueError(option, displayValue(defaultValue))
    ),
    E.chainW(() => valueOf(parseResult, option)),
    E.map(O.getOrElse(() => defaultValue))
  );
}

export function isFlagSet(parseResult: ParseResult, option: OptionDescriptor<'boolean'>): boolean {
  return pipe(valuesOf(parseResult, option), RA.head, O.getOrElse(constFalse));
}

export function fileValuesOf(
  parseResult: ParseResult,
  option: OptionDescriptor<'file'>
): ReadonlyArray<string> {
  return pipe(
    valuesOf(parseResult, option),
    RA.map(filePath => path.resolve(filePath))
  );
}

export function parsedSolitaryHyphen(parseResult: ParseResult): boolean {
  return parseResult.nonOptionArgs.includes(SOLITARY_HYPHEN);
}

export function optionByName<K extends OptionKind>(
  registry: OptionRegistry,
  optionName: string,
  kind: K
): E.Either<UnknownOptionError | InvalidOptionTypeError, OptionDescriptor<K>> {
  return pipe(
    registry.lookup(optionName),
    E.fromOption(() => new UnknownOptionError(optionName)),
    E.chainW(
      E.fromPredicate(hasKind(kind), () => new InvalidOptionTypeError(optionName, kind))
    )
  );
}

export function valuesByName<K extends OptionKind>(
  registry: OptionRegistry,
  parseResult: ParseResult,
  optionName: string,
  kind: K
): E.Either<UnknownOptionError | InvalidOptionTypeError, ReadonlyArray<ValueOf<K>>> {
  return pipe(
    optionByName(registry, optionName, kind),
    E.map(option => valuesOf(parseResult, option))
  );
}
