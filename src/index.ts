#!/usr/bin/env node

import * as IO from 'fp-ts/lib/IO';

import main from './app/cli';

import { pipe } from 'fp-ts/lib/function';
import { CliOutcome } from './types';
import { logErrors, logOutput, logWarnings } from './utils';

function logCliOutcome({ errors, warnings, output, exitCode }: CliOutcome): IO.IO<void> {
  return pipe(
    logOutput(output),
    IO.chain(() => logWarnings(warnings)),
    IO.chain(() => logErrors(errors)),
    IO.chain(() => () => {
      process.exitCode = exitCode;
    })
  );
}

pipe(process.argv.slice(2), main, IO.chain(logCliOutcome))();
