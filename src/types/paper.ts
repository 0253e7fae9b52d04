export interface Link {
  href: string;
  rel: string;
  type?: string | null;
  title?: string | null;
}

export interface Category {
  term: string;
  scheme: string;
}

export interface SearchResult {
  id: string;
  title: string;
  summary: string;
  authors: string[][];
  links: Link[];
  published: string;
  updated: string;
  categories: Category[];
}

export interface PaginationParams {
  page: number;
  query: string;
}
