import { SearchResult } from '../src/types';

export function makePaper(id: string, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    id: `http://arxiv.org/abs/${id}`,
    title: `Paper ${id}`,
    summary: `Summary of paper ${id}`,
    authors: [['Ada Example'], ['Grace Sample']],
    links: [
      { href: `https://arxiv.org/abs/${id}`, rel: 'alternate', type: 'text/html' },
      { href: `https://arxiv.org/pdf/${id}`, rel: 'related', type: 'application/pdf', title: 'pdf' },
    ],
    published: '2024-03-01T00:00:00Z',
    updated: '2024-03-02T00:00:00Z',
    categories: [{ term: 'cs.DS', scheme: 'http://arxiv.org/schemas/atom' }],
    ...overrides,
  };
}

export function makePage(count: number, prefix = '2403'): SearchResult[] {
  return Array.from({ length: count }, (_, index) => makePaper(`${prefix}.${String(index).padStart(5, '0')}`));
}
