import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import { pipe } from 'fp-ts/lib/function';
import { OptionDescriptor, OptionKind } from './types';
import { DuplicateNameError, InvalidDeclarationError, UnknownOptionError } from './errors';

/**
 * Ordered collection of declared options. Insertion order is kept and drives
 * the order of usage entries. Short names are unique, and so are long names
 * where present.
 */
export default class OptionRegistry {
  #options: ReadonlyArray<OptionDescriptor> = [];

  // Keyed by short name; descriptors themselves stay untouched
  #hiddenShortNames = new Set<string>();

  register<K extends OptionKind>(
    option: OptionDescriptor<K>
  ): E.Either<DuplicateNameError, OptionDescriptor<K>> {
    return pipe(
      this.#findNameCollision(option),
      O.match(
        () => {
          this.#options = RA.append<OptionDescriptor>(option)(this.#options);
          return E.right(option);
        },
        collidingName => E.left(new DuplicateNameError(collidingName))
      )
    );
  }

  // Registers the outcome of a declaration factory
  addOption<K extends OptionKind>(
    declarationResult: E.Either<InvalidDeclarationError, OptionDescriptor<K>>
  ): E.Either<InvalidDeclarationError | DuplicateNameError, OptionDescriptor<K>> {
    return pipe(
      declarationResult,
      E.chainW(option => this.register(option))
    );
  }

  unregister(target: OptionDescriptor | string): E.Either<UnknownOptionError, OptionDescriptor> {
    const targetOption =
      typeof target === 'string'
        ? this.lookup(target)
        : pipe(
            this.#options,
            RA.findFirst(option => option === target)
          );

    return pipe(
      targetOption,
      E.fromOption(
        () => new UnknownOptionError(typeof target === 'string' ? target : target.shortName)
      ),
      E.map(removedOption => {
        this.#options = pipe(
          this.#options,
          RA.filter(option => option !== removedOption)
        );

        this.#hiddenShortNames.delete(removedOption.shortName);
        return removedOption;
      })
    );
  }

  lookupByShortName(shortName: string): O.Option<OptionDescriptor> {
    return pipe(
      this.#options,
      RA.findFirst(option => option.shortName === shortName)
    );
  }

  lookupByLongName(longName: string): O.Option<OptionDescriptor> {
    return pipe(
      this.#options,
      RA.findFirst(option => option.longName === longName)
    );
  }

  // Single-character names are tried as short names first
  lookup(optionName: string): O.Option<OptionDescriptor> {
    return pipe(
      optionName.length === 1 ? this.lookupByShortName(optionName) : O.none,
      O.alt(() => this.lookupByLongName(optionName))
    );
  }

  setHidden(optionName: string): E.Either<UnknownOptionError, OptionDescriptor> {
    return pipe(
      this.lookup(optionName),
      E.fromOption(() => new UnknownOptionError(optionName)),
      E.map(option => {
        this.#hiddenShortNames.add(option.shortName);
        return option;
      })
    );
  }

  isHidden(option: OptionDescriptor): boolean {
    return option.hidden || this.#hiddenShortNames.has(option.shortName);
  }

  options(): ReadonlyArray<OptionDescriptor> {
    return this.#options;
  }

  #findNameCollision(candidate: OptionDescriptor): O.Option<string> {
    return pipe(
      this.lookupByShortName(candidate.shortName),
      O.map(() => candidate.shortName),
      O.alt(() =>
        pipe(
          O.fromNullable(candidate.longName),
          O.filter(longName => O.isSome(this.lookupByLongName(longName)))
        )
      )
    );
  }
}
