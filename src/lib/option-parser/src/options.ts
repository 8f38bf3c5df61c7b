import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';

import { match } from 'ts-pattern';
import { Predicate } from 'fp-ts/lib/Predicate';
import { Locale } from '../../messages';
import { pipe, constTrue } from 'fp-ts/lib/function';
import { IllegalValueError, InvalidDeclarationError } from './errors';
import { MAX_COUNT_LIMIT, MIN_COUNT_LIMIT, optionNamePredicate } from './constants';
import {
  OptionKind,
  UsageType,
  OptionValue,
  ValueOf,
  OptionDescriptor,
} from './types';
import {
  FileType,
  FileFilter,
  parseBoolean,
  parseDouble,
  parseInteger,
  parseIsoDate,
  parseFloat32,
  acceptsPath,
  FileExistence,
  matchEnumString,
  matchEnumInteger,
  parseLongInteger,
} from '../../value-parsers';

// Either the explicit count bounds or the mandatory/allowMany shorthand, never both
type OptionArity =
  | {
      readonly mandatory?: boolean;
      readonly allowMany?: boolean;
      readonly minCount?: never;
      readonly maxCount?: never;
    }
  | {
      readonly minCount: number;
      readonly maxCount: number;
      readonly mandatory?: never;
      readonly allowMany?: never;
    };

export type OptionDeclaration = {
  readonly shortName: string;
  readonly longName?: string;
  readonly description?: string;
  readonly hidden?: boolean;
} & OptionArity;

type DeclarationResult<K extends OptionKind> = E.Either<
  InvalidDeclarationError,
  OptionDescriptor<K>
>;

interface CountBounds {
  readonly minCount: number;
  readonly maxCount: number;
}

interface KindDefinition<K extends OptionKind> {
  readonly kind: K;
  readonly usageType: UsageType;
  readonly allowedValues?: ReadonlyArray<ValueOf<K>>;
  readonly parse: (rawValue: string, locale: Locale) => O.Option<ValueOf<K>>;
  readonly isValue: (value: OptionValue) => value is ValueOf<K>;
}

const isBoolean = (value: OptionValue): value is boolean => typeof value === 'boolean';
const isNumber = (value: OptionValue): value is number => typeof value === 'number';
const isBigInt = (value: OptionValue): value is bigint => typeof value === 'bigint';
const isString = (value: OptionValue): value is string => typeof value === 'string';
const isDate = (value: OptionValue): value is Date => value instanceof Date;

function resolveCountBounds(declaration: OptionDeclaration): CountBounds {
  return {
    minCount: declaration.minCount ?? (declaration.mandatory ? 1 : 0),
    maxCount: declaration.maxCount ?? (declaration.allowMany ? MAX_COUNT_LIMIT : 1),
  };
}

function validateDeclaration(
  declaration: OptionDeclaration
): E.Either<InvalidDeclarationError, CountBounds> {
  const { shortName, longName } = declaration;
  const countBounds = resolveCountBounds(declaration);
  const { minCount, maxCount } = countBounds;

  if (!optionNamePredicate.isShortName(shortName)) {
    return E.left(new InvalidDeclarationError('decl.BadShortName', [shortName]));
  }

  if (longName !== undefined && !optionNamePredicate.isLongName(longName)) {
    return E.left(new InvalidDeclarationError('decl.BadLongName', [longName]));
  }

  if (!Number.isInteger(minCount) || minCount < MIN_COUNT_LIMIT) {
    return E.left(new InvalidDeclarationError('decl.BadMinCount', [MIN_COUNT_LIMIT]));
  }

  if (!Number.isInteger(maxCount) || maxCount < minCount || maxCount > MAX_COUNT_LIMIT) {
    return E.left(new InvalidDeclarationError('decl.BadMaxCount', [MAX_COUNT_LIMIT]));
  }

  return E.right(countBounds);
}

function defineOption<K extends OptionKind>(definition: KindDefinition<K>) {
  return (declaration: OptionDeclaration): DeclarationResult<K> =>
    pipe(
      validateDeclaration(declaration),
      E.map(({ minCount, maxCount }) => {
        const descriptor: OptionDescriptor<K> = {
          kind: definition.kind,
          shortName: declaration.shortName,
          longName: declaration.longName,
          description: declaration.description,
          requiresValue: definition.kind !== 'boolean',
          minCount,
          maxCount,
          hidden: declaration.hidden ?? false,
          usageType: definition.usageType,
          allowedValues: definition.allowedValues ?? [],
          isValue: definition.isValue,

          parseValue: (rawValue, locale) =>
            pipe(
              definition.parse(rawValue, locale),
              E.fromOption(() => new IllegalValueError(descriptor, rawValue))
            ),
        };

        return descriptor;
      })
    );
}

function requireAllowedValues(allowedValues: ReadonlyArray<unknown>) {
  return <K extends OptionKind>(result: DeclarationResult<K>): DeclarationResult<K> =>
    allowedValues.length > 0
      ? result
      : pipe(
          result,
          E.chain(() => E.left(new InvalidDeclarationError('decl.NoAllowedValues')))
        );
}

export const booleanOption = defineOption({
  kind: 'boolean',
  usageType: 'boolean',
  parse: parseBoolean,
  isValue: isBoolean,
});

export const integerOption = defineOption({
  kind: 'integer',
  usageType: 'integer',
  parse: parseInteger,
  isValue: isNumber,
});

export const longOption = defineOption({
  kind: 'long',
  usageType: 'long',
  parse: parseLongInteger,
  isValue: isBigInt,
});

export const doubleOption = defineOption({
  kind: 'double',
  usageType: 'double',
  parse: parseDouble,
  isValue: isNumber,
});

export const floatOption = defineOption({
  kind: 'float',
  usageType: 'float',
  parse: parseFloat32,
  isValue: isNumber,
});

export const dateOption = defineOption({
  kind: 'date',
  usageType: 'date',
  parse: parseIsoDate,
  isValue: isDate,
});

export function stringOption(
  declaration: OptionDeclaration & { readonly filter?: Predicate<string> }
): DeclarationResult<'string'> {
  const filter: Predicate<string> = declaration.filter ?? constTrue;

  return defineOption({
    kind: 'string',
    usageType: 'string',
    parse: O.fromPredicate(filter),
    isValue: isString,
  })(declaration);
}

export function enumStringOption(
  declaration: OptionDeclaration & {
    readonly allowedValues: ReadonlyArray<string>;
    readonly ignoreCase?: boolean;
  }
): DeclarationResult<'enum-string'> {
  const { allowedValues, ignoreCase = true } = declaration;

  return pipe(
    defineOption({
      kind: 'enum-string',
      usageType: 'enum-string',
      allowedValues,
      parse: (rawValue, locale) =>
        matchEnumString(allowedValues, ignoreCase, locale)(rawValue),
      isValue: isString,
    })(declaration),
    requireAllowedValues(allowedValues)
  );
}

export function enumIntegerOption(
  declaration: OptionDeclaration & { readonly allowedValues: ReadonlyArray<number> }
): DeclarationResult<'enum-integer'> {
  const { allowedValues } = declaration;

  return pipe(
    defineOption({
      kind: 'enum-integer',
      usageType: 'enum-integer',
      allowedValues,
      parse: matchEnumInteger(allowedValues),
      isValue: isNumber,
    })(declaration),
    requireAllowedValues(allowedValues)
  );
}

function usageTypeForFileType(fileType: FileType): UsageType {
  return match(fileType)
    .with('file', (): UsageType => 'file')
    .with('directory', (): UsageType => 'directory')
    .with('any', (): UsageType => 'path')
    .exhaustive();
}

export function fileOption(
  declaration: OptionDeclaration & {
    readonly existence?: FileExistence;
    readonly fileType?: FileType;
  }
): DeclarationResult<'file'> {
  const fileFilter: FileFilter = {
    existence: declaration.existence ?? 'any',
    fileType: declaration.fileType ?? 'any',
  };

  return defineOption({
    kind: 'file',
    usageType: usageTypeForFileType(fileFilter.fileType),
    parse: O.fromPredicate(acceptsPath(fileFilter)),
    isValue: isString,
  })(declaration);
}

export function existingFileOption(declaration: OptionDeclaration) {
  return fileOption({ ...declaration, existence: 'existing', fileType: 'file' });
}

export function existingDirectoryOption(declaration: OptionDeclaration) {
  return fileOption({ ...declaration, existence: 'existing', fileType: 'directory' });
}

export function newFileOption(declaration: OptionDeclaration) {
  return fileOption({ ...declaration, existence: 'new', fileType: 'any' });
}
