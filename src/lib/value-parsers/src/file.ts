import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';

import path from 'path';
import fsExtra from 'fs-extra';

import type { Stats } from 'fs-extra';

import { match } from 'ts-pattern';
import { pipe, constTrue } from 'fp-ts/lib/function';

export type FileExistence = 'any' | 'existing' | 'new';
export type FileType = 'any' | 'file' | 'directory';

export interface FileFilter {
  readonly existence: FileExistence;
  readonly fileType: FileType;
}

function statPath(absolutePath: string): O.Option<Stats> {
  return pipe(
    E.tryCatch(() => fsExtra.statSync(absolutePath), E.toError),
    O.fromEither
  );
}

export function acceptsPath({ existence, fileType }: FileFilter) {
  return (rawValue: string): boolean => {
    const pathStats = statPath(path.resolve(rawValue));
    const pathExists = O.isSome(pathStats);

    const passesExistenceFilter = match(existence)
      .with('existing', () => pathExists)
      .with('new', () => !pathExists)
      .with('any', constTrue)
      .exhaustive();

    const passesTypeFilter = match(fileType)
      .with('file', () => pipe(pathStats, O.exists(stats => stats.isFile())))
      .with('directory', () => pipe(pathStats, O.exists(stats => stats.isDirectory())))
      .with('any', constTrue)
      .exhaustive();

    return passesExistenceFilter && passesTypeFilter;
  };
}
