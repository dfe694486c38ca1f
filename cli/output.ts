/**
 * Progress, summary and failure output shared by the CLI commands
 */

export interface OutputOptions {
  quiet?: boolean;
  json?: boolean;
}

// Tags used by the library modules for their own logging
const LIBRARY_TAGS = ['[Encoder]', '[Decoder]', '[Noise]'];

function isLibraryLog(args: unknown[]): boolean {
  const msg = args[0];
  return typeof msg === 'string' && LIBRARY_TAGS.some(tag => msg.startsWith(tag));
}

/**
 * Progress logger on stderr, silent with --quiet or --json
 */
export function createLog(options: OutputOptions): (...args: unknown[]) => void {
  return options.quiet || options.json ? () => {} : console.error.bind(console);
}

/**
 * Run fn with the library's tagged logs muted in quiet and json modes
 */
export function withLibraryLogs<T>(options: OutputOptions, fn: () => T): T {
  if (!options.quiet && !options.json) {
    return fn();
  }

  const originalLog = console.log;
  const originalWarn = console.warn;
  console.log = (...args: unknown[]) => {
    if (!isLibraryLog(args)) originalLog.apply(console, args);
  };
  console.warn = (...args: unknown[]) => {
    if (!isLibraryLog(args)) originalWarn.apply(console, args);
  };

  try {
    return fn();
  } finally {
    console.log = originalLog;
    console.warn = originalWarn;
  }
}

/**
 * Print a result object as JSON on stdout
 */
export function printJson(result: object): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Report an error and exit with status 1
 */
export function fail(error: unknown, options: OutputOptions): never {
  const message = error instanceof Error ? error.message : String(error);
  if (options.json) {
    printJson({ success: false, error: message });
  } else {
    console.error(`Error: ${message}`);
  }
  return process.exit(1);
}
