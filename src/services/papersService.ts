import { ApiClient } from './api';
import { FetchError, PaginationParams, SearchResult } from '../types';

export interface SearchGateway {
  search(params: PaginationParams): Promise<SearchResult[]>;
}

export class PapersService implements SearchGateway {
  constructor(private readonly apiClient: ApiClient) {}

  // One request per page/query change; the service answers with a bare JSON array
  async search({ query, page }: PaginationParams): Promise<SearchResult[]> {
    const body = await this.apiClient.get<unknown>('', {
      params: { q: query, p: String(page) },
    });

    if (!Array.isArray(body)) {
      throw new FetchError({
        error: 'MalformedResponse',
        message: 'The search service returned something other than a list of results.',
        statusCode: null,
        timestamp: new Date().toISOString(),
        method: 'GET',
        params: { q: query, p: String(page) },
      });
    }

    return body;
  }
}
