import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import * as S from 'fp-ts/lib/string';
import * as IO from 'fp-ts/lib/IO';
import * as RA from 'fp-ts/lib/ReadonlyArray';

import path from 'path';
import helpCmd from '../cmds/help';
import versionCmd from '../cmds/version';
import formatUsage, { formatOptionError, UsageSettings } from '../lib/usage';
import optionParser, {
  Argv,
  valueOf,
  valuesOf,
  OptionError,
  ParseResult,
  booleanOption,
  integerOption,
  valueOrDefault,
  OptionRegistry,
  ParserSettings,
  OptionDescriptor,
  enumStringOption,
  nonOptionArguments,
  END_OF_OPTIONS_MARKER,
  existingDirectoryOption,
  resolveParserSettings,
} from '../lib/option-parser';

import { match, P } from 'ts-pattern';
import { pipe } from 'fp-ts/lib/function';
import { CliOutcome, CmdResponse } from '../types';
import { APP_NAME, ExitCodes, HELP_REQUEST_TOKENS } from '../constants';

const VERSION_REQUEST_TOKENS: ReadonlyArray<string> = ['-@', '/@', '--version'];

const DEFAULT_FORMAT = 'jpg';

export interface DemoOptions {
  readonly width: OptionDescriptor<'integer'>;
  readonly height: OptionDescriptor<'integer'>;
  readonly dir: OptionDescriptor<'file'>;
  readonly format: OptionDescriptor<'enum-string'>;
  readonly verbose: OptionDescriptor<'boolean'>;
  readonly version: OptionDescriptor<'boolean'>;
  readonly help: OptionDescriptor<'boolean'>;
}

export interface DemoSettings {
  readonly parser: Partial<ParserSettings>;
  readonly usage: Partial<UsageSettings>;
}

export function declareDemoOptions(registry: OptionRegistry): E.Either<OptionError, DemoOptions> {
  return pipe(
    E.Do,
    E.bindW('width', () =>
      registry.addOption(
        integerOption({
          shortName: 'w',
          longName: 'width',
          description: 'Width of the resized images, in pixels.',
          mandatory: true,
        })
      )
    ),
    E.bindW('height', () =>
      registry.addOption(
        integerOption({
          shortName: 'h',
          longName: 'height',
          description: 'Height of the resized images, in pixels.',
          mandatory: true,
        })
      )
    ),
    E.bindW('dir', () =>
      registry.addOption(
        existingDirectoryOption({
          shortName: 'd',
          longName: 'dir',
          description: 'Directory the resized images are written to.',
        })
      )
    ),
    E.bindW('format', () =>
      registry.addOption(
        enumStringOption({
          shortName: 'f',
          longName: 'format',
          description: 'Output format of the resized images.',
          allowedValues: ['jpg', 'png'],
        })
      )
    ),
    E.bindW('verbose', () =>
      registry.addOption(
        booleanOption({
          shortName: 'v',
          longName: 'verbose',
          description: 'Prints more details, repeat for even more.',
          allowMany: true,
        })
      )
    ),
    E.bindW('version', () =>
      registry.addOption(
        booleanOption({
          shortName: '@',
          longName: 'version',
          description: 'Prints the version and exits.',
        })
      )
    ),
    E.bindW('help', () =>
      registry.addOption(
        booleanOption({
          shortName: '?',
          longName: 'help',
          description: 'Prints this help and exits.',
        })
      )
    )
  );
}

function resolveDemoSettings(overrides: Partial<DemoSettings>): DemoSettings {
  const parser = resolveParserSettings(overrides.parser);

  return {
    parser,
    usage: {
      appName: APP_NAME,
      suffixArgs: '<image> [<image>] ...',
      locale: parser.locale,
      ...overrides.usage,
    },
  };
}

// Only tokens before the end-of-options marker count
function requestsAnyOf(requestTokens: ReadonlyArray<string>) {
  return (argv: Argv): boolean =>
    pipe(
      argv,
      RA.takeLeftWhile(arg => arg !== END_OF_OPTIONS_MARKER),
      RA.some(arg => requestTokens.includes(arg))
    );
}

function toCliOutcome(cmdResponse: CmdResponse): CliOutcome {
  return {
    ...cmdResponse,
    exitCode: RA.isEmpty(cmdResponse.errors) ? ExitCodes.OK : ExitCodes.GENERAL,
  };
}

export function describeResizeJob(
  parseResult: ParseResult,
  options: DemoOptions
): E.Either<OptionError, string[]> {
  return pipe(
    E.Do,
    E.bindW('width', () => valueOrDefault(parseResult, options.width, 0)),
    E.bindW('height', () => valueOrDefault(parseResult, options.height, 0)),
    E.bindW('format', () => valueOrDefault(parseResult, options.format, DEFAULT_FORMAT)),
    E.bindW('dir', () => valueOf(parseResult, options.dir)),
    E.map(({ width, height, format, dir }) => {
      const outputDir = pipe(
        dir,
        O.map(dirPath => path.resolve(dirPath)),
        O.getOrElse(() => path.resolve('.'))
      );

      const verbosity = pipe(
        valuesOf(parseResult, options.verbose),
        RA.filter(isSet => isSet)
      ).length;

      const images = pipe(
        nonOptionArguments(parseResult),
        RA.intercalate(S.Monoid)(', '),
        O.fromPredicate(imageList => !S.isEmpty(imageList)),
        O.getOrElse(() => '(none)')
      );

      return [
        `Size: ${width}x${height}`,
        `Format: ${format}`,
        `Directory: ${outputDir}`,
        `Verbosity: ${verbosity}`,
        `Images: ${images}`,
      ];
    })
  );
}

function runResizeJob(
  registry: OptionRegistry,
  options: DemoOptions,
  settings: DemoSettings
) {
  return (argv: Argv): IO.IO<CliOutcome> => {
    const usageFailure = (error: OptionError): CliOutcome => ({
      errors: [formatOptionError(error, settings.parser.locale)],
      warnings: [],
      output: [formatUsage(registry, false, settings.usage)],
      exitCode: ExitCodes.USAGE,
    });

    return pipe(
      optionParser(registry, settings.parser)(argv),
      E.chain(parseResult => describeResizeJob(parseResult, options)),
      E.match(usageFailure, (output): CliOutcome => ({
        errors: [],
        warnings: [],
        output,
        exitCode: ExitCodes.OK,
      })),
      IO.of
    );
  };
}

/**
 * Demonstration front end: declares the options of an image resizing tool
 * and reports what it would do with them.
 */
export default function main(argv: Argv, overrides: Partial<DemoSettings> = {}): IO.IO<CliOutcome> {
  const settings = resolveDemoSettings(overrides);
  const registry = new OptionRegistry();

  return pipe(
    declareDemoOptions(registry),
    E.match(
      (error): IO.IO<CliOutcome> =>
        IO.of({ errors: [error.message], warnings: [], output: [], exitCode: ExitCodes.GENERAL }),

      options => {
        const wantsHelp = RA.isEmpty(argv) || requestsAnyOf(HELP_REQUEST_TOKENS)(argv);
        const wantsVersion = requestsAnyOf(VERSION_REQUEST_TOKENS)(argv);

        return match([wantsHelp, wantsVersion] as const)
          .with([true, P.boolean], () => IO.of(toCliOutcome(helpCmd(registry, settings.usage))))
          .with([false, true], () => pipe(versionCmd(), IO.map(toCliOutcome)))
          .with([false, false], () => runResizeJob(registry, options, settings)(argv))
          .exhaustive();
      }
    )
  );
}
