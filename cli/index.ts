/**
 * hamcode CLI - Hamming(7,4) encode, corrupt and decode files
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { encodeCommand } from './encode';
import { corruptCommand } from './corrupt';
import { decodeCommand } from './decode';
import { runCommand } from './run';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    console.warn('[CLI] Could not read package version:', error instanceof Error ? error.message : error);
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('hamcode')
  .description('Protect files with a Hamming(7,4) error-correcting code.\n\nEvery 4 bits of input become a 7-bit block that survives any single flipped bit. Files can be encoded, run through a simulated noisy channel, and decoded back.')
  .version(readVersion())
  .addHelpText('after', `
Examples:
  $ hamcode encode photo.jpg photo.ham
  $ hamcode corrupt photo.ham noisy.ham --seed 42
  $ hamcode decode noisy.ham restored.jpg
  $ hamcode run 0 notes.txt notes.ham`);

program
  .command('encode')
  .description('Encode a file, adding 3 parity bits to every 4 data bits')
  .argument('<input>', 'File to encode')
  .argument('<output>', 'Encoded file to write')
  .option('-n, --noise', 'Also pass the encoded blocks through the noisy channel')
  .option('-s, --seed <seed>', 'Seed for the noisy channel; implies --noise (default: current time)')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .addHelpText('after', `
The encoded file is 7/4 the size of the input, rounded up to a whole byte.
The zero bits added at the end never form a block of their own, so decoding
restores the original length exactly.`)
  .action(encodeCommand);

program
  .command('corrupt')
  .description('Simulate a noisy channel: each 7-bit block has a 1 in 7 chance of one flipped bit')
  .argument('<input>', 'Encoded file')
  .argument('<output>', 'Corrupted file to write')
  .option('-s, --seed <seed>', 'Seed for the noisy channel (default: current time)')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON (includes every flipped bit)')
  .action(corruptCommand);

program
  .command('decode')
  .description('Decode a file, correcting one flipped bit per block')
  .argument('<input>', 'Encoded (possibly corrupted) file')
  .argument('<output>', 'Decoded file to write')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .addHelpText('after', `
Limitations:
  A block with two or more flipped bits is "corrected" into the wrong data
  without any warning. Hamming(7,4) cannot detect double errors.`)
  .action(decodeCommand);

program
  .command('run')
  .description('Single entry point: run the operation named by <mode>')
  .argument('<mode>', 'encode (0), decode (1) or corrupt (2)')
  .argument('<input>', 'Input file')
  .argument('<output>', 'Output file')
  .option('-n, --noise', 'With encode, also pass the blocks through the noisy channel')
  .option('-s, --seed <seed>', 'Seed for the noisy channel, with encode or corrupt; implies --noise on encode')
  .option('-q, --quiet', 'Suppress progress output (only show result)')
  .option('--json', 'Output result as JSON')
  .action(runCommand);

program.parse();
