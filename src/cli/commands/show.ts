import type { Command } from 'commander';

import { readSettings } from '../../bootstrap/env.js';
import { readTextIfExists } from '../../io/files.js';
import { formatTimestamp, fromDisk, toDisk } from '../../modules/portfolio/snapshot.js';
import type { Position } from '../../modules/portfolio/types.js';
import { printJson, resolveEnv, resolvePath, type CommandContext } from './shared.js';

type ShowOptions = {
  output?: string;
  json?: boolean;
};

const describePositions = (positions: readonly Position[]): string => {
  const noun = positions.length === 1 ? 'position' : 'positions';
  const tickers = positions.length > 0 ? ` (${positions.map((position) => position.ticker).join(', ')})` : '';
  return `${positions.length} ${noun}${tickers}`;
};

export function registerShowCommand(program: Command, context: CommandContext): Command {
  return program
    .command('show')
    .description('Prints a summary of the persisted snapshot.')
    .option('--output <file>', 'Snapshot file to read (defaults to OUTPUT_PATH)')
    .option('--json', 'Print the snapshot as JSON')
    .action(async (options: ShowOptions) => {
      const outputPath = options.output
        ? resolvePath(context, options.output)
        : readSettings(resolveEnv(context)).outputPath;

      const text = await readTextIfExists(outputPath);
      if (text === null) {
        context.output.error(`No snapshot at ${outputPath}`);
        context.setExitCode(1);
        return;
      }

      const { snapshot, dropped } = fromDisk(JSON.parse(text));
      if (options.json) {
        printJson(context, toDisk(snapshot));
        context.setExitCode(0);
        return;
      }

      const { log } = context.output;
      log(`Snapshot: ${outputPath}`);
      log(`Last updated: ${snapshot.updatedAt ? formatTimestamp(snapshot.updatedAt) : 'unknown'}`);
      log(`Source: ${snapshot.source || 'unknown'}`);
      log(`sector_rotation: ${describePositions(snapshot.sectorRotation)}`);
      log(`long_term: ${describePositions(snapshot.longTerm)}`);
      if (dropped > 0) {
        log(`Skipped ${dropped} invalid entries`);
      }
      context.setExitCode(0);
    });
}
