import * as E from 'fp-ts/lib/Either';

import { silentLogger } from '../src/lib/logger';
import { ParserSettings } from '../src/lib/option-parser';

export const quietEnglishSettings: ParserSettings = {
  locale: 'en',
  logger: silentLogger,
};

export function getRight<L, R>(either: E.Either<L, R>): R {
  if (E.isLeft(either)) throw new Error(`Expected a Right, got a Left: ${String(either.left)}`);
  return either.right;
}

export function getLeft<L, R>(either: E.Either<L, R>): L {
  if (E.isRight(either)) throw new Error('Expected a Left, got a Right');
  return either.left;
}
