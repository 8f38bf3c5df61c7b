import { ExitCodes } from '../constants';

export interface CmdResponse {
  readonly errors: string[];
  readonly warnings: string[];
  readonly output: string[];
}

export interface CliOutcome extends CmdResponse {
  readonly exitCode: ExitCodes;
}

export interface PackageJson {
  readonly name: string;
  readonly version: string;
}
