/**
 * Error types for the dataset pipeline.
 *
 * Data-quality problems never raise: missing columns, unparseable values and
 * empty inputs all resolve to neutral results. Only a caller passing a
 * nonsensical argument, or a source that cannot be read at all, is an error.
 */

export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    message: string
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class DatasetLoadError extends Error {
  constructor(
    public readonly source: string,
    message?: string
  ) {
    super(message ?? `Failed to load dataset: ${source}`);
    this.name = "DatasetLoadError";
  }
}

/**
 * Assert that a count-like argument is a non-negative integer.
 * @throws InvalidArgumentError otherwise
 */
export function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(
      name,
      `${name} must be a non-negative integer, got: ${value}`
    );
  }
}

/**
 * Assert that an argument is an integer of at least 1.
 * @throws InvalidArgumentError otherwise
 */
export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(
      name,
      `${name} must be a positive integer, got: ${value}`
    );
  }
}
