import * as A from 'fp-ts/lib/Array';
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as IO from 'fp-ts/lib/IO';

import path from 'path';
import chalk from 'chalk';
import fsExtra from 'fs-extra';

import { pipe } from 'fp-ts/lib/function';

enum LogColor {
  ERROR = 'red',
  WARNING = 'yellow',
  OUTPUT = 'white',
}

export function logErrors(errorMsgs: string[]): IO.IO<void> {
  return () => {
    if (A.isEmpty(errorMsgs)) return;

    const errStr = pipe(errorMsgs, A.map(chalk.red), A.intercalate(S.Monoid)('\n'));

    const title = `${chalk[`${LogColor.ERROR}Bright`].underline.bold(
      'Errors'
    )}(${chalk[LogColor.ERROR].dim.underline(errorMsgs.length)})`;

    console.error(title);
    console.error(errStr);
  };
}

export function logWarnings(warnings: string[]): IO.IO<void> {
  return () => {
    if (A.isEmpty(warnings)) return;

    const warningStr = pipe(warnings, A.map(chalk.yellow), A.intercalate(S.Monoid)('\n'));

    const title = `${chalk[`${LogColor.WARNING}Bright`].underline.bold(
      'Warnings'
    )}(${chalk[LogColor.WARNING].dim.underline(warnings.length)})`;

    console.warn(title);
    console.warn(warningStr);
  };
}

export function logOutput(outputMsgs: string[]): IO.IO<void> {
  return () => {
    if (A.isEmpty(outputMsgs)) return;
    console.log(pipe(outputMsgs, A.map(chalk[LogColor.OUTPUT]), A.intercalate(S.Monoid)('\n')));
  };
}

// Walks up from startDir until the file is found or the filesystem root is reached
export function findUp(fileName: string, startDir: string): O.Option<string> {
  const candidatePath = path.join(startDir, fileName);
  if (fsExtra.pathExistsSync(candidatePath)) return O.some(candidatePath);

  const parentDir = path.dirname(startDir);
  return parentDir === startDir ? O.none : findUp(fileName, parentDir);
}

export function readJsonSync(jsonFilePath: string): E.Either<Error, unknown> {
  return E.tryCatch((): unknown => fsExtra.readJsonSync(jsonFilePath), E.toError);
}
