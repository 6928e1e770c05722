import { type RuntimeResource } from '../lifecycle';

export interface SearchResult {
  title   : string;
  snippet : string;
  url?    : string;
}

export interface SearchProvider extends RuntimeResource {
  search(query: string, options?: { limit?: number }): Promise<SearchResult[]>;
}
