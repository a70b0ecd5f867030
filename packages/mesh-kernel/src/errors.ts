/**
 * Kernel error types.
 *
 * Load failures are recoverable and carry a `kind` the caller can switch on.
 * The rest guard contracts: seeing one means the caller misused the API.
 */

export type MeshLoadErrorKind =
  | 'unreadable'
  | 'malformed'
  | 'missing-field'
  | 'invalid-vertex'
  | 'invalid-index'
  | 'ragged-vertices'
  | 'ragged-indices'
  | 'index-out-of-range';

export class MeshLoadError extends Error {
  readonly kind: MeshLoadErrorKind;
  /** File path, when the document came from disk. */
  source?: string;

  constructor(kind: MeshLoadErrorKind, message: string, options?: { source?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MeshLoadError';
    this.kind = kind;
    this.source = options?.source;
  }
}

/** Geometry record invariant violated (dangling index, bad triangle number). */
export class MeshInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeshInvariantError';
  }
}

/** A mutation was attempted while a reader holds the record. */
export class MeshBusyError extends Error {
  constructor(operation: string, readers: number) {
    super(
      `Cannot ${operation}: mesh is being read by ${readers} in-flight operation(s). ` +
      `Wait for statistics to finish first.`
    );
    this.name = 'MeshBusyError';
  }
}

export class StatisticsInFlightError extends Error {
  constructor() {
    super('A statistics computation is already running for this mesh. Poll the existing handle.');
    this.name = 'StatisticsInFlightError';
  }
}
