import * as O from 'fp-ts/lib/Option';

import { pipe } from 'fp-ts/lib/function';

const INTEGER_LITERAL_REGEX = /^[+-]?\d+$/;

export const INT32_RANGE = { min: -2147483648, max: 2147483647 } as const;

export const INT64_RANGE = {
  min: BigInt('-9223372036854775808'),
  max: BigInt('9223372036854775807'),
} as const;

function isIntegerLiteral(rawValue: string): boolean {
  return INTEGER_LITERAL_REGEX.test(rawValue);
}

export function parseInteger(rawValue: string): O.Option<number> {
  return pipe(
    rawValue.trim(),
    O.fromPredicate(isIntegerLiteral),
    O.map(Number),
    O.filter(value => value >= INT32_RANGE.min && value <= INT32_RANGE.max)
  );
}

export function parseLongInteger(rawValue: string): O.Option<bigint> {
  return pipe(
    rawValue.trim(),
    O.fromPredicate(isIntegerLiteral),
    O.map(BigInt),
    O.filter(value => value >= INT64_RANGE.min && value <= INT64_RANGE.max)
  );
}
