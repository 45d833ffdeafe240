// Error types and process exit codes for the rendering pipeline

export const EXIT_CODES = {
  formatGuessFailed: 1,
  openFailed: 2,
  decodeFailed: 3,
  config: 4,
} as const;

export const ERROR_MESSAGES = {
  formatGuessFailed: (name: string) =>
    `Failed to guess format of "${name}".`,

  openFailed: (name: string) =>
    `Failed to open image file "${name}".`,

  decodeFailed: (name: string) =>
    `Failed to decode image file "${name}".`,

  invalidSize: (value: string) =>
    `"${value}" is not a valid size (in format "NNNxMMM")`,

  zeroSize: () =>
    `Can't resize image to size 0`,

  oddHeight: (height: number) =>
    `Image height ${height} is odd; half-block rendering needs two pixel rows per terminal row`,

  sizeRequired: () =>
    `Terminal size could not be detected; pass --size NxM`,

  imageNotFound: (name: string) =>
    `Image file "${name}" not found`,

  imageRequired: () =>
    `No image file given`,

  missingFlagValue: (flag: string, allowed?: readonly string[]) =>
    `${flag} requires a value${allowed ? ` [${allowed.join('|')}]` : ''}`,

  unknownFlag: (flag: string) =>
    `Unknown option ${flag}`,

  invalidOption: (path: string, value: unknown, allowed: readonly string[]) =>
    `Invalid value ${JSON.stringify(value)} for ${path} [${allowed.join('|')}]`,

  invalidConfigFile: (path: string, reason: string) =>
    `Invalid config file "${path}": ${reason}`,
};

/**
 * Base class for every failure the CLI reports. Each kind maps to its own exit code.
 */
export abstract class BlockcatError extends Error {
  abstract readonly exitCode: number;
}

/**
 * Neither the extension nor the leading bytes identified a supported codec.
 */
export class FormatGuessFailedError extends BlockcatError {
  readonly exitCode = EXIT_CODES.formatGuessFailed;

  constructor(public readonly fileName: string) {
    super(ERROR_MESSAGES.formatGuessFailed(fileName));
    this.name = 'FormatGuessFailedError';
  }
}

/**
 * The file could not be opened or read.
 */
export class OpenFailedError extends BlockcatError {
  readonly exitCode = EXIT_CODES.openFailed;

  constructor(public readonly fileName: string, options?: { cause?: unknown }) {
    super(ERROR_MESSAGES.openFailed(fileName), options);
    this.name = 'OpenFailedError';
  }
}

/**
 * The file was read but the codec rejected its contents, or no decoder exists for its format.
 */
export class DecodeFailedError extends BlockcatError {
  readonly exitCode = EXIT_CODES.decodeFailed;

  constructor(public readonly fileName: string, options?: { cause?: unknown }) {
    super(ERROR_MESSAGES.decodeFailed(fileName), options);
    this.name = 'DecodeFailedError';
  }
}

/**
 * Invalid options: malformed or zero size, odd render height, missing terminal size.
 */
export class ConfigError extends BlockcatError {
  readonly exitCode = EXIT_CODES.config;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Exit code for any thrown value; unexpected errors exit with 1.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof BlockcatError ? error.exitCode : 1;
}

/**
 * Write the human-readable message for a failure, one line.
 */
export function printError(error: unknown, write: (text: string) => void): void {
  write(`${ensureError(error).message}\n`);
}
