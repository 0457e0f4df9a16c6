import type { ErrorClass } from '../anti-blocking/types.js';

type RawLookupResponse = {
  statusCode: number;
  body: unknown;
};

interface LookupClient {
  lookup(prefix: string): Promise<RawLookupResponse>;
}

interface LookupRecorder {
  recordRequest(): void;
  recordQuery(prefixLength: number, resultCount: number): void;
}

type LookupSuccess = {
  success: true;
  names: string[];
  truncated: boolean;
  count?: number;
  attempts: number;
};

type LookupFailure = {
  success: false;
  errorClass: ErrorClass;
  lastErrorClass: ErrorClass;
  error: string;
  statusCode?: number;
  attempts: number;
};

type LookupOutcome = LookupSuccess | LookupFailure;

export type {
  RawLookupResponse,
  LookupClient,
  LookupRecorder,
  LookupSuccess,
  LookupFailure,
  LookupOutcome,
};
