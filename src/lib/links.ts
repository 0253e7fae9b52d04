import type { Link, SearchResult } from '../types';

export const PDF_LINK_TITLE = 'pdf';
export const ALTERNATE_REL = 'alternate';

export function findPdfLink(paper: SearchResult): Link | undefined {
  return paper.links.find((link) => link.title === PDF_LINK_TITLE);
}

export function findAlternateLink(paper: SearchResult): Link | undefined {
  return paper.links.find((link) => link.rel === ALTERNATE_REL);
}

/**
 * Rewrites an abstract-page URL to its HTML rendering,
 * e.g. https://arxiv.org/abs/1234 -> https://ar5iv.org/abs/1234.
 */
export function toHtmlMirror(href: string, mirror: { from: string; to: string }): string {
  return href.replaceAll(mirror.from, mirror.to);
}

export function resolvePdfUrl(paper: SearchResult): string | null {
  return findPdfLink(paper)?.href ?? null;
}

export function resolveHtmlUrl(paper: SearchResult, mirror: { from: string; to: string }): string | null {
  const link = findAlternateLink(paper);
  return link ? toHtmlMirror(link.href, mirror) : null;
}

export const formatAuthors = (authors: string[][]): string => authors.flat().join(', ');
