/**
 * Feed could not be retrieved or parsed. Scoped to one feed source; the sync
 * cycle moves on to the next source.
 */
export class FetchError extends Error {
  override readonly name = "FetchError";

  constructor(
    readonly feedName: string,
    readonly url: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** Entry has no usable title. Only that entry is skipped. */
export class ExtractionError extends Error {
  override readonly name = "ExtractionError";

  constructor(
    readonly entryIdentity: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Notification endpoint rejected the request or could not be reached.
 * `status` is null when no response arrived.
 */
export class DispatchError extends Error {
  override readonly name = "DispatchError";

  constructor(
    readonly topic: string,
    readonly status: number | null,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** History store failed. Aborts the current sync cycle. */
export class StoreError extends Error {
  override readonly name = "StoreError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
