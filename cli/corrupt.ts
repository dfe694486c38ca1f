/**
 * CLI Corrupt Command
 */

import { corruptBytes } from '../src/channel';
import { SeededRandom, resolveSeed } from '../src/lib/random';
import { formatBytes } from '../src/utils/helpers';
import { readBytes, writeBytes } from './file-io';
import { createLog, fail, printJson, withLibraryLogs, type OutputOptions } from './output';

export interface CorruptCommandOptions extends OutputOptions {
  seed?: string;
}

export function corruptCommand(
  input: string,
  output: string,
  options: CorruptCommandOptions
): void {
  const log = createLog(options);

  try {
    const seed = resolveSeed(options.seed);

    log(`Reading ${input}...`);
    const data = readBytes(input);

    log(`Corrupting ${formatBytes(data.length)} (seed ${seed})...`);
    const result = withLibraryLogs(options, () => corruptBytes(data, new SeededRandom(seed)));

    writeBytes(output, result.data);

    if (options.json) {
      printJson({
        success: true,
        operation: 'corrupt',
        input,
        output,
        bytes: result.stats.size,
        blocks: result.stats.blocks,
        corruptedBlocks: result.stats.corruptedBlocks,
        flips: result.flips,
        seed,
      });
      return;
    }

    console.error(`Input:   ${input} (${result.stats.size} bytes)`);
    console.error(`Output:  ${output}`);
    console.error(`Blocks:  ${result.stats.blocks}`);
    console.error(`Flipped: ${result.stats.corruptedBlocks} blocks (seed ${seed})`);
  } catch (error) {
    fail(error, options);
  }
}
