import { Command } from 'commander';
import { createCliContext } from '../context.js';
import { reportError } from '../utils/exit.js';
import { addOriginOptions, addPathFilterOptions, toPathFilter } from '../utils/options.js';
import type { OriginCommandOptions, PathFilterOptions } from '../utils/options.js';
import { formatJson, writeOutput } from '../utils/output.js';

export const describeCommand = addPathFilterOptions(
  addOriginOptions(new Command('describe').description('Print the origin description')),
).action((options: OriginCommandOptions & PathFilterOptions) => {
  try {
    const { origin } = createCliContext(options);
    writeOutput(formatJson(origin.describe(toPathFilter(options)), options.pretty), options.output);
  } catch (err) {
    process.exit(reportError(err));
  }
});
