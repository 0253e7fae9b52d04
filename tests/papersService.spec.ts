import { describe, it, expect } from 'vitest';
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ApiClient } from '../src/services/api';
import { PapersService } from '../src/services/papersService';
import { FetchError } from '../src/types';
import { makePaper } from './fixtures';

const BASE_URL = 'https://search.test';

const respond = (config: InternalAxiosRequestConfig, status: number, body: string): AxiosResponse => ({
  data: body,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config,
});

function serviceWith(adapter: AxiosAdapter): PapersService {
  return new PapersService(new ApiClient({ baseURL: BASE_URL, adapter }));
}

async function captureFetchError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('expected the request to fail');
}

describe('PapersService.search', () => {
  it('sends the query and page as q and p and returns the parsed list', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const papers = [makePaper('2401.00001'), makePaper('2401.00002')];
    const service = serviceWith(async (config) => {
      requests.push(config);
      return respond(config, 200, JSON.stringify(papers));
    });

    const result = await service.search({ query: 'graph theory', page: 3 });

    expect(result).toEqual(papers);
    expect(requests).toHaveLength(1);
    expect(requests[0].baseURL).toBe(BASE_URL);
    expect(requests[0].method).toBe('get');
    expect(requests[0].params).toEqual({ q: 'graph theory', p: '3' });
  });

  it('passes an empty query through unchanged', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const service = serviceWith(async (config) => {
      requests.push(config);
      return respond(config, 200, '[]');
    });

    await expect(service.search({ query: '', page: 1 })).resolves.toEqual([]);
    expect(requests[0].params).toEqual({ q: '', p: '1' });
  });

  it('rejects a body that is not valid JSON', async () => {
    const service = serviceWith(async (config) => respond(config, 200, '<html>oops</html>'));

    const error = await captureFetchError(service.search({ query: 'graphs', page: 2 }));

    expect(error.details.error).toBe('ERR_BAD_RESPONSE');
    expect(error.details.statusCode).toBeNull();
    expect(error.details.message).toBe('The search service returned a malformed response.');
    expect(error.details.endpoint).toBe('https://search.test?q=graphs&p=2');
  });

  it('reports a parse failure on a successful response as malformed', async () => {
    const service = serviceWith(async (config) => {
      throw new AxiosError(
        "Unexpected token '<'",
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        respond(config, 200, '<html>oops</html>')
      );
    });

    const error = await captureFetchError(service.search({ query: 'graphs', page: 1 }));

    expect(error.details.statusCode).toBeNull();
    expect(error.message).toBe('The search service returned a malformed response.');
  });

  it('rejects a JSON body that is not a list', async () => {
    const service = serviceWith(async (config) => respond(config, 200, '{"error":"nope"}'));

    const error = await captureFetchError(service.search({ query: 'graphs', page: 2 }));

    expect(error.details.error).toBe('MalformedResponse');
    expect(error.details.params).toEqual({ q: 'graphs', p: '2' });
  });

  it('maps an error status to a FetchError carrying the status code', async () => {
    const service = serviceWith(async (config) => {
      throw new AxiosError(
        'Request failed with status code 503',
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        respond(config, 503, '')
      );
    });

    const error = await captureFetchError(service.search({ query: 'graphs', page: 1 }));

    expect(error.kind).toBe('fetch');
    expect(error.details.statusCode).toBe(503);
    expect(error.details.method).toBe('GET');
    expect(error.message).toBe('The search service is temporarily unavailable.');
  });

  it('maps a network failure to a FetchError without a status code', async () => {
    const service = serviceWith(async (config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    });

    const error = await captureFetchError(service.search({ query: 'graphs', page: 1 }));

    expect(error.details.statusCode).toBeNull();
    expect(error.details.error).toBe('ECONNREFUSED');
    expect(error.message).toBe('Unable to reach the search service: connect ECONNREFUSED');
  });
});
