/**
 * Error taxonomy for the build engine.
 *
 * Everything a build can fail with derives from SlideshowError so the
 * orchestrator can report a one-line reason to chat. A redundant trigger is
 * a rejection value returned by the orchestrator, not an error.
 */

export class SlideshowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad configuration key or value. Raised synchronously; nothing is stored. */
export class ValidationError extends SlideshowError {
  constructor(message: string, public readonly key?: string) {
    super(message);
  }
}

/** The image source holds no usable images. */
export class EmptyInventoryError extends SlideshowError {
  constructor(public readonly folder: string) {
    super(`No images found in ${folder || '(unset folder)'}`);
  }
}

/** The time left for slides cannot show even one slide for the minimum duration. */
export class DurationTooShortError extends SlideshowError {
  constructor(
    public readonly availableSeconds: number,
    public readonly minimumSeconds: number,
  ) {
    super(
      `Only ${formatSeconds(availableSeconds)}s available for slides; ` +
      `each slide needs at least ${formatSeconds(minimumSeconds)}s`,
    );
  }
}

/** One or more referenced files or folders do not exist. */
export class ResourceNotFoundError extends SlideshowError {
  constructor(public readonly missing: readonly string[], options?: { cause?: unknown }) {
    super(`Missing resources: ${missing.join(', ')}`, options);
  }
}

/** Storage, chat or push I/O failed. `retryable` marks network/5xx failures. */
export class TransportError extends SlideshowError {
  constructor(
    message: string,
    options: { cause?: unknown; status?: number; retryable?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }

  readonly status: number | undefined;
  readonly retryable: boolean;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatSeconds(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
