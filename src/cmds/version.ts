import * as E from 'fp-ts/lib/Either';
import * as IO from 'fp-ts/lib/IO';
import * as D from 'io-ts/lib/Decoder';

import { pipe } from 'fp-ts/lib/function';
import { CmdResponse, PackageJson } from '../types';
import { findUp, readJsonSync } from '../utils';
import { PACKAGE_JSON_FILE_NAME } from '../constants';

const PackageJsonDecoder: D.Decoder<unknown, PackageJson> = D.struct({
  name: D.string,
  version: D.string,
});

export function getCliVersion(startDir: string = __dirname): IO.IO<E.Either<Error, string>> {
  return () =>
    pipe(
      findUp(PACKAGE_JSON_FILE_NAME, startDir),
      E.fromOption(() => new Error(`Could not find ${PACKAGE_JSON_FILE_NAME} above ${startDir}`)),
      E.chain(readJsonSync),
      E.chain(rawPackageJson =>
        pipe(
          PackageJsonDecoder.decode(rawPackageJson),
          E.mapLeft(decodeError => new Error(D.draw(decodeError)))
        )
      ),
      E.map(({ version }) => version)
    );
}

export default function main(): IO.IO<CmdResponse> {
  return pipe(
    getCliVersion(),
    IO.map(
      E.match(
        (error): CmdResponse => ({ errors: [error.message], warnings: [], output: [] }),
        (cliVersion): CmdResponse => ({ errors: [], warnings: [], output: [`v${cliVersion}`] })
      )
    )
  );
}
