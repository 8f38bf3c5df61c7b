import * as O from 'fp-ts/lib/Option';

import { pipe } from 'fp-ts/lib/function';
import { formatIsoDate } from '../../value-parsers';
import { OptionDescriptor, OptionKind, OptionValue } from './types';
import { DEFAULT_LOCALE, formatMessage, Locale, MessageArg, MessageKey } from '../../messages';

export enum OPTION_ERROR_KIND {
  UNKNOWN_OPTION = 'UNKNOWN_OPTION',
  NOT_A_FLAG = 'NOT_A_FLAG',
  ILLEGAL_VALUE = 'ILLEGAL_VALUE',
  DUPLICATE_SINGLE_VALUE = 'DUPLICATE_SINGLE_VALUE',
  VALUE_LIMIT_EXCEEDED = 'VALUE_LIMIT_EXCEEDED',
  INVALID_COUNT = 'INVALID_COUNT',
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  INVALID_DECLARATION = 'INVALID_DECLARATION',
  INVALID_OPTION_TYPE = 'INVALID_OPTION_TYPE',
  INVALID_RETRIEVAL = 'INVALID_RETRIEVAL',
}

type OptionNames = Pick<OptionDescriptor, 'shortName' | 'longName'>;

// -w,--width
export function optionLabel({ shortName, longName }: OptionNames): string {
  return pipe(
    O.fromNullable(longName),
    O.match(
      () => `-${shortName}`,
      presentLongName => `-${shortName},--${presentLongName}`
    )
  );
}

export function displayValue(value: OptionValue): string {
  return value instanceof Date ? formatIsoDate(value) : String(value);
}

export abstract class OptionError extends Error {
  protected constructor(
    readonly kind: OPTION_ERROR_KIND,
    private readonly messageKey: MessageKey,
    private readonly messageArgs: ReadonlyArray<MessageArg>
  ) {
    super(formatMessage(DEFAULT_LOCALE, messageKey, messageArgs));
    this.name = new.target.name;
  }

  localizedMessage(locale: Locale): string {
    return formatMessage(locale, this.messageKey, this.messageArgs);
  }
}

export class UnknownOptionError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.UNKNOWN_OPTION;

  constructor(readonly optionName: string) {
    super(OPTION_ERROR_KIND.UNKNOWN_OPTION, 'err.UnknownOption', [optionName]);
  }
}

export class NotAFlagError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.NOT_A_FLAG;

  constructor(readonly option: OptionDescriptor, readonly cluster: string) {
    super(OPTION_ERROR_KIND.NOT_A_FLAG, 'err.NotAFlag', [optionLabel(option), cluster]);
  }
}

export class IllegalValueError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.ILLEGAL_VALUE;

  // An absent raw value means no value was supplied at all
  constructor(readonly option: OptionNames, readonly rawValue?: string) {
    super(
      OPTION_ERROR_KIND.ILLEGAL_VALUE,
      rawValue === undefined ? 'err.MissingOptionValue' : 'err.IllegalOptionValue',
      rawValue === undefined ? [optionLabel(option)] : [optionLabel(option), rawValue]
    );
  }
}

export class DuplicateSingleValueError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.DUPLICATE_SINGLE_VALUE;

  constructor(readonly option: OptionDescriptor, readonly value: OptionValue) {
    super(OPTION_ERROR_KIND.DUPLICATE_SINGLE_VALUE, 'err.DuplicateSingleValue', [
      optionLabel(option),
      displayValue(value),
    ]);
  }
}

export class ValueLimitExceededError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.VALUE_LIMIT_EXCEEDED;

  constructor(readonly option: OptionDescriptor, readonly value: OptionValue) {
    super(OPTION_ERROR_KIND.VALUE_LIMIT_EXCEEDED, 'err.ValueLimitExceeded', [
      optionLabel(option),
      option.maxCount,
    ]);
  }
}

export class InvalidCountError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.INVALID_COUNT;

  constructor(readonly option: OptionDescriptor, readonly count: number) {
    super(OPTION_ERROR_KIND.INVALID_COUNT, 'err.InvalidCount', [
      optionLabel(option),
      option.minCount,
      option.maxCount,
      count,
    ]);
  }
}

export class DuplicateNameError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.DUPLICATE_NAME;

  constructor(readonly optionName: string) {
    super(OPTION_ERROR_KIND.DUPLICATE_NAME, 'err.DuplicateName', [optionName]);
  }
}

export class InvalidDeclarationError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.INVALID_DECLARATION;

  constructor(
    readonly reasonKey: MessageKey,
    readonly reasonArgs: ReadonlyArray<MessageArg> = []
  ) {
    super(OPTION_ERROR_KIND.INVALID_DECLARATION, 'err.InvalidDeclaration', [
      formatMessage(DEFAULT_LOCALE, reasonKey, reasonArgs),
    ]);
  }

  localizedMessage(locale: Locale): string {
    return formatMessage(locale, 'err.InvalidDeclaration', [
      formatMessage(locale, this.reasonKey, this.reasonArgs),
    ]);
  }
}

export class InvalidOptionTypeError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.INVALID_OPTION_TYPE;

  constructor(readonly optionName: string, readonly expectedKind: OptionKind) {
    super(OPTION_ERROR_KIND.INVALID_OPTION_TYPE, 'err.InvalidOptionType', [
      optionName,
      expectedKind,
    ]);
  }
}

export class InvalidRetrievalError extends OptionError {
  declare readonly kind: OPTION_ERROR_KIND.INVALID_RETRIEVAL;

  constructor(readonly option: OptionDescriptor) {
    super(OPTION_ERROR_KIND.INVALID_RETRIEVAL, 'err.InvalidRetrieval', [optionLabel(option)]);
  }
}
