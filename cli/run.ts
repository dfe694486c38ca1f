/**
 * CLI Run Command - single entry point selecting the operation by mode
 */

import { encodeCommand, type EncodeCommandOptions } from './encode';
import { corruptCommand } from './corrupt';
import { decodeCommand } from './decode';
import { fail } from './output';

export type Mode = 'encode' | 'decode' | 'corrupt';

// Numeric aliases: 0 encode, 1 decode, 2 corrupt
const MODES: Record<string, Mode> = {
  encode: 'encode',
  '0': 'encode',
  decode: 'decode',
  '1': 'decode',
  corrupt: 'corrupt',
  '2': 'corrupt',
};

export function parseMode(selector: string): Mode | null {
  return Object.prototype.hasOwnProperty.call(MODES, selector) ? MODES[selector] : null;
}

export function runCommand(
  selector: string,
  input: string,
  output: string,
  options: EncodeCommandOptions
): void {
  const mode = parseMode(selector.toLowerCase());

  if (mode === null) {
    fail(
      new Error(`Invalid parameters! Unknown mode "${selector}". Use encode (0), decode (1) or corrupt (2).`),
      options
    );
  }

  if (mode === 'decode' && (options.noise || options.seed !== undefined)) {
    fail(new Error('Invalid parameters! --noise and --seed do not apply to decode.'), options);
  }

  switch (mode) {
    case 'encode':
      encodeCommand(input, output, options);
      break;
    case 'decode':
      decodeCommand(input, output, options);
      break;
    case 'corrupt':
      corruptCommand(input, output, options);
      break;
  }
}
