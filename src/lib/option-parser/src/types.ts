import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';

import type { Locale } from '../../messages';
import type { Logger } from '../../logger';
import type { IllegalValueError } from './errors';

export type Argv = ReadonlyArray<string>;

export interface KindValueMap {
  boolean: boolean;
  integer: number;
  long: bigint;
  double: number;
  float: number;
  string: string;
  date: Date;
  'enum-string': string;
  'enum-integer': number;
  file: string;
}

export type OptionKind = keyof KindValueMap;
export type ValueOf<K extends OptionKind> = KindValueMap[K];
export type OptionValue = ValueOf<OptionKind>;

// Value-type label shown in usage messages
export type UsageType = OptionKind | 'directory' | 'path';

export interface OptionDescriptor<K extends OptionKind = OptionKind> {
  readonly kind: K;
  readonly shortName: string;
  readonly longName?: string;
  readonly description?: string;
  readonly requiresValue: boolean;
  readonly minCount: number;
  readonly maxCount: number;
  readonly hidden: boolean;
  readonly usageType: UsageType;

  // Empty unless the option is enumerated
  readonly allowedValues: ReadonlyArray<ValueOf<K>>;

  readonly parseValue: (
    rawValue: string,
    locale: Locale
  ) => E.Either<IllegalValueError, ValueOf<K>>;

  readonly isValue: (value: OptionValue) => value is ValueOf<K>;
}

export interface ParseResult {
  // Keyed by short name, values in the order they were given
  readonly values: ReadonlyMap<string, ReadonlyArray<OptionValue>>;
  readonly nonOptionArgs: ReadonlyArray<string>;
}

export interface ParserSettings {
  readonly locale: Locale;
  readonly logger: Logger;
}

export interface RuleSet {
  readonly longOption: RegExp;
  readonly flagCluster: O.Option<RegExp>;
  readonly flagsThenValueOption: O.Option<RegExp>;
  readonly shortOption: RegExp;
  readonly flagCharacters: string;
  readonly valueOptionCharacters: string;
}

export enum ARGV_TOKEN_TYPE {
  NON_OPTION = 'NON_OPTION',
  END_OF_OPTIONS = 'END_OF_OPTIONS',
  LONG_OPTION = 'LONG_OPTION',
  FLAG_CLUSTER = 'FLAG_CLUSTER',
  FLAGS_THEN_VALUE_OPTION = 'FLAGS_THEN_VALUE_OPTION',
  SHORT_OPTION = 'SHORT_OPTION',
}

export interface NonOptionToken {
  readonly tokenType: ARGV_TOKEN_TYPE.NON_OPTION;
  readonly arg: string;
}

export interface EndOfOptionsToken {
  readonly tokenType: ARGV_TOKEN_TYPE.END_OF_OPTIONS;
}

export interface LongOptionToken {
  readonly tokenType: ARGV_TOKEN_TYPE.LONG_OPTION;
  readonly longName: string;
  readonly inlineValue: O.Option<string>;
}

export interface FlagClusterToken {
  readonly tokenType: ARGV_TOKEN_TYPE.FLAG_CLUSTER;
  readonly flags: string;
}

export interface FlagsThenValueOptionToken {
  readonly tokenType: ARGV_TOKEN_TYPE.FLAGS_THEN_VALUE_OPTION;
  readonly flags: string;
  readonly shortName: string;
  readonly inlineValue: O.Option<string>;
}

export interface ShortOptionToken {
  readonly tokenType: ARGV_TOKEN_TYPE.SHORT_OPTION;
  readonly shortName: string;
  readonly inlineValue: O.Option<string>;
}

export type ArgvToken =
  | NonOptionToken
  | EndOfOptionsToken
  | LongOptionToken
  | FlagClusterToken
  | FlagsThenValueOptionToken
  | ShortOptionToken;
