import formatUsage, { UsageSettings } from '../lib/usage';

import { CmdResponse } from '../types';
import { OptionRegistry } from '../lib/option-parser';

export default function main(
  registry: OptionRegistry,
  usageSettings: Partial<UsageSettings>
): CmdResponse {
  return {
    errors: [],
    warnings: [],
    output: [formatUsage(registry, true, usageSettings)],
  };
}
