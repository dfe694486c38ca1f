/**
 * CLI Decode Command
 */

import { decodeBytes } from '../src/decode';
import { formatBytes } from '../src/utils/helpers';
import { readBytes, writeBytes } from './file-io';
import { createLog, fail, printJson, withLibraryLogs, type OutputOptions } from './output';

export function decodeCommand(
  input: string,
  output: string,
  options: OutputOptions
): void {
  const log = createLog(options);

  try {
    log(`Reading ${input}...`);
    const data = readBytes(input);

    log(`Decoding ${formatBytes(data.length)}...`);
    const result = withLibraryLogs(options, () => decodeBytes(data));

    writeBytes(output, result.data);

    if (options.json) {
      printJson({
        success: true,
        operation: 'decode',
        input,
        output,
        inputBytes: result.stats.encodedSize,
        outputBytes: result.stats.decodedSize,
        blocks: result.stats.blocks,
        correctedBlocks: result.stats.correctedBlocks,
        droppedBits: result.stats.droppedBits,
      });
      return;
    }

    console.error(`Input:     ${input} (${result.stats.encodedSize} bytes)`);
    console.error(`Output:    ${output} (${result.stats.decodedSize} bytes)`);
    console.error(`Corrected: ${result.stats.correctedBlocks} of ${result.stats.blocks} blocks`);
  } catch (error) {
    fail(error, options);
  }
}
