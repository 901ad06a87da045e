export class MemoryEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A record with the same content hash already exists, live or soft-deleted. */
export class DuplicateContentError extends MemoryEngineError {
  readonly contentHash: string;

  constructor(contentHash: string, options?: { cause?: unknown }) {
    super(`Duplicate content detected (existing memory: ${contentHash})`, options);
    this.contentHash = contentHash;
  }
}

/** The database stayed locked by another connection for longer than the busy timeout. */
export class StoreBusyError extends MemoryEngineError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Memory store is busy (${operation}); retry later`, options);
  }
}

/** No inference backend is configured or reachable. */
export class CapabilityUnavailableError extends MemoryEngineError {}

export class ConfigError extends MemoryEngineError {}
