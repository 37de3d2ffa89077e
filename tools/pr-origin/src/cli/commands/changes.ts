import { Command } from 'commander';
import { revisionToJson } from 'pr-kit';
import type { Change } from 'pr-kit';
import { createCliContext } from '../context.js';
import { reportError } from '../utils/exit.js';
import { addOriginOptions, addPathFilterOptions, toPathFilter } from '../utils/options.js';
import type { OriginCommandOptions, PathFilterOptions } from '../utils/options.js';
import { formatJson, writeOutput } from '../utils/output.js';

function changeToJson(change: Change): Record<string, unknown> {
  return {
    sha: change.revision.sha,
    author: change.author,
    date: change.date,
    parents: change.parents,
    message: change.message,
    labels: change.revision.labels.toRecord(),
  };
}

export const changesCommand = addPathFilterOptions(
  addOriginOptions(
    new Command('changes')
      .description('Resolve a reference and list the changes since its baseline')
      .argument('<reference>', 'PR number, PR URL, refs/pull/<n>/head or commit sha'),
  ),
).action(async (reference: string, options: OriginCommandOptions & PathFilterOptions) => {
  try {
    const { origin, config, logger } = createCliContext(options);
    const revision = await origin.resolve(reference);
    const reader = origin.newReader(toPathFilter(options), config.authoring);

    const baseline = await reader.findBaseline(revision, origin.labelName());
    logger.debug('Baseline lookup finished', { baseline: baseline?.sha ?? null });
    const { changes } = await reader.changes(baseline?.revision ?? null, revision);

    writeOutput(
      formatJson(
        {
          revision: revisionToJson(revision),
          baseline: baseline?.sha ?? null,
          changes: changes.map(changeToJson),
        },
        options.pretty,
      ),
      options.output,
    );
  } catch (err) {
    process.exit(reportError(err));
  }
});
