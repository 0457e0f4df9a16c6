class CheckpointStorageError extends Error {
  readonly code = 'checkpoint-storage' as const;
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Could not write checkpoint ${path}: ${message}`, options);
    this.name = 'CheckpointStorageError';
    this.path = path;
  }
}

export { CheckpointStorageError };
