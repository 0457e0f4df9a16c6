import { describe, it, expect } from 'vitest';
import { FakeAutocompleteService } from '../test-utils/fake-autocomplete-service.js';
import { AutocompleteClient } from './autocomplete-client.js';
import { AutocompleteNetworkError } from './errors.js';

function makeClient(service: FakeAutocompleteService, baseUrl = 'http://autocomplete.test') {
  return new AutocompleteClient({
    baseUrl,
    apiVersion: 2,
    maxResults: 2,
    timeoutMs: 1000,
    adapter: service.adapter,
  });
}

describe('AutocompleteClient', () => {
  it('builds the versioned endpoint without doubling slashes', () => {
    const service = new FakeAutocompleteService({ names: [] });

    expect(makeClient(service, 'http://autocomplete.test///').endpoint).toBe(
      'http://autocomplete.test/v2/autocomplete',
    );
  });

  it('sends the prefix and the page size as query parameters', async () => {
    const service = new FakeAutocompleteService({ names: ['ka', 'kb', 'kc', 'x'] });
    const client = makeClient(service);

    const response = await client.lookup('k');

    expect(service.queries).toEqual(['k']);
    expect(response).toEqual({
      statusCode: 200,
      body: { results: ['ka', 'kb'], count: 3 },
    });
  });

  it('resolves error statuses instead of throwing', async () => {
    const service = new FakeAutocompleteService({ names: [] });
    service.script({ status: 503, body: 'unavailable' });

    const response = await makeClient(service).lookup('k');

    expect(response).toEqual({ statusCode: 503, body: 'unavailable' });
  });

  it('wraps transport failures in AutocompleteNetworkError', async () => {
    const service = new FakeAutocompleteService({ names: [] });
    service.script({ networkError: 'socket hang up' });

    const error = await makeClient(service).lookup('zz').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AutocompleteNetworkError);
    expect(error instanceof AutocompleteNetworkError && error.prefix).toBe('zz');
    expect(error instanceof AutocompleteNetworkError && error.message).toBe(
      'Lookup for "zz" failed before a response: socket hang up',
    );
  });
});
