/**
 * CLI Encode Command
 */

import { encodeBytes } from '../src/encode';
import { SeededRandom, resolveSeed } from '../src/lib/random';
import { formatBytes } from '../src/utils/helpers';
import { readBytes, writeBytes } from './file-io';
import { createLog, fail, printJson, withLibraryLogs, type OutputOptions } from './output';

export interface EncodeCommandOptions extends OutputOptions {
  noise?: boolean;
  seed?: string;
}

export function encodeCommand(
  input: string,
  output: string,
  options: EncodeCommandOptions
): void {
  const log = createLog(options);

  try {
    // --seed implies --noise
    const noisy = options.noise === true || options.seed !== undefined;
    const seed = noisy ? resolveSeed(options.seed) : undefined;

    log(`Reading ${input}...`);
    const data = readBytes(input);

    log(`Encoding ${formatBytes(data.length)}...`);
    if (seed !== undefined) {
      log(`Noise: on (seed ${seed})`);
    }
    const result = withLibraryLogs(options, () =>
      encodeBytes(data, { noise: seed !== undefined ? new SeededRandom(seed) : undefined })
    );

    writeBytes(output, result.data);

    if (options.json) {
      printJson({
        success: true,
        operation: 'encode',
        input,
        output,
        inputBytes: result.stats.originalSize,
        outputBytes: result.stats.encodedSize,
        blocks: result.stats.blocks,
        paddingBits: result.stats.paddingBits,
        corruptedBlocks: result.stats.corruptedBlocks,
        seed: seed ?? null,
      });
      return;
    }

    // Final summary to stderr
    console.error(`Input:   ${input} (${result.stats.originalSize} bytes)`);
    console.error(`Output:  ${output} (${result.stats.encodedSize} bytes)`);
    console.error(`Blocks:  ${result.stats.blocks}`);
    console.error(`Padding: ${result.stats.paddingBits} bits`);
    if (seed !== undefined) {
      console.error(`Noise:   ${result.stats.corruptedBlocks} blocks corrupted (seed ${seed})`);
    }
  } catch (error) {
    fail(error, options);
  }
}
