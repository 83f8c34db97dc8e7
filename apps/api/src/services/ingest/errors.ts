/** Batch-level faults. Row-level problems are counted, never thrown. */
export class IngestError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request carried no usable line or reading. */
export class EmptyBatchError extends IngestError {
  constructor() {
    super('batch contains no telemetry lines', 'empty_batch', 400);
  }
}

/** Persisting the batch failed; nothing from it was committed. */
export class StorageError extends IngestError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`storage failure, batch rolled back: ${detail}`, 'storage_error', 500, { cause });
  }
}
