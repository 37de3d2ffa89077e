import { Command } from 'commander';
import { revisionToJson } from 'pr-kit';
import { createCliContext } from '../context.js';
import { reportError } from '../utils/exit.js';
import { addOriginOptions } from '../utils/options.js';
import type { OriginCommandOptions } from '../utils/options.js';
import { formatJson, writeOutput } from '../utils/output.js';

export const resolveCommand = addOriginOptions(
  new Command('resolve')
    .description('Resolve a pull request reference to a labeled revision')
    .argument('<reference>', 'PR number, PR URL, refs/pull/<n>/head or commit sha'),
).action(async (reference: string, options: OriginCommandOptions) => {
  try {
    const { origin, logger } = createCliContext(options);
    const revision = await origin.resolve(reference);
    logger.progress(`Resolved ${reference} to ${revision.sha}`);
    writeOutput(formatJson(revisionToJson(revision), options.pretty), options.output);
  } catch (err) {
    process.exit(reportError(err));
  }
});
