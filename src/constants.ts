export enum ExitCodes {
  OK = 0,
  GENERAL = 1,
  USAGE = 2,
}

export const APP_NAME = 'optsmith-demo';

export const PACKAGE_JSON_FILE_NAME = 'package.json';

// Plain tokens that ask for help regardless of what else is on the command line
export const HELP_REQUEST_TOKENS: ReadonlyArray<string> = ['-?', '/?', '--help'];
