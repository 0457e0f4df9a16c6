class AutocompleteNetworkError extends Error {
  readonly code = 'network-error' as const;
  readonly prefix: string;

  constructor(prefix: string, message: string, options?: { cause?: unknown }) {
    super(`Lookup for "${prefix}" failed before a response: ${message}`, options);
    this.name = 'AutocompleteNetworkError';
    this.prefix = prefix;
  }
}

export { AutocompleteNetworkError };
