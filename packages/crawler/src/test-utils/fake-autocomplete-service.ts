import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

type FakeReply =
  | { status: number; body?: unknown }
  | { networkError: string };

type FakeAutocompleteServiceOptions = {
  names: readonly string[];
  onQuery?: (query: string) => void;
};

/**
 * In-process stand-in for the autocomplete endpoint, plugged into axios as an
 * adapter. Answers from a fixed catalogue, sorted ascending and cut at
 * `max_results`, unless scripted replies are pending.
 */
export class FakeAutocompleteService {
  readonly queries: string[];
  private readonly names: string[];
  private readonly scripted: FakeReply[];
  private readonly onQuery: ((query: string) => void) | undefined;

  constructor(options: FakeAutocompleteServiceOptions) {
    this.names = [...new Set(options.names)].sort();
    this.queries = [];
    this.scripted = [];
    this.onQuery = options.onQuery;
  }

  script(...replies: FakeReply[]): void {
    this.scripted.push(...replies);
  }

  answer(query: string, maxResults: number): { results: string[]; count: number } {
    const matches = this.names.filter((name) => name.startsWith(query));
    return { results: matches.slice(0, maxResults), count: matches.length };
  }

  timesQueried(query: string): number {
    return this.queries.filter((value) => value === query).length;
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const query = String(config.params?.query ?? '');
    const maxResults = Number(config.params?.max_results ?? 0);

    this.queries.push(query);
    this.onQuery?.(query);

    const reply = this.scripted.shift();
    if (reply && 'networkError' in reply) {
      throw new AxiosError(reply.networkError, 'ECONNRESET', config);
    }

    if (reply) {
      return this.respond(config, reply.status, reply.body);
    }

    return this.respond(config, 200, this.answer(query, maxResults));
  };

  private respond(
    config: InternalAxiosRequestConfig,
    status: number,
    body: unknown,
  ): AxiosResponse {
    return {
      data: body,
      status,
      statusText: String(status),
      headers: {},
      config,
      request: {},
    };
  }
}

export type { FakeReply, FakeAutocompleteServiceOptions };
