import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { AutocompleteNetworkError } from './errors.js';
import type { LookupClient, RawLookupResponse } from './types.js';

type AutocompleteClientConfig = {
  baseUrl: string;
  apiVersion: number;
  maxResults: number;
  timeoutMs: number;
  maxSockets?: number;
  adapter?: AxiosAdapter;
};

/**
 * Thin axios transport for `GET /v{N}/autocomplete`.
 *
 * Every HTTP status resolves; only a request that never got a response
 * rejects, as an {@link AutocompleteNetworkError}. Classifying statuses is the
 * fetcher's job.
 */
export class AutocompleteClient implements LookupClient {
  readonly endpoint: string;
  private readonly maxResults: number;
  private readonly axiosInstance: AxiosInstance;

  constructor(config: AutocompleteClientConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/v${config.apiVersion}/autocomplete`;
    this.maxResults = config.maxResults;

    const maxSockets = config.maxSockets ?? 10;

    this.axiosInstance = axios.create({
      timeout: config.timeoutMs,
      maxRedirects: 5,
      validateStatus: () => true,
      adapter: config.adapter,
      headers: {
        Accept: 'application/json',
        'User-Agent': 'prefix-crawler/0.1',
      },
      // One pooled connection set shared by every worker
      httpAgent: new http.Agent({
        keepAlive: true,
        keepAliveMsecs: 1000,
        maxSockets,
      }),
      httpsAgent: new https.Agent({
        keepAlive: true,
        keepAliveMsecs: 1000,
        maxSockets,
      }),
    });
  }

  async lookup(prefix: string): Promise<RawLookupResponse> {
    try {
      const response = await this.axiosInstance.get<unknown>(this.endpoint, {
        params: { query: prefix, max_results: this.maxResults },
      });

      return { statusCode: response.status, body: response.data };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AutocompleteNetworkError(prefix, message, { cause: error });
    }
  }
}

export type { AutocompleteClientConfig };
