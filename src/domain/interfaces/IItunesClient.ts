/**
 * iTunes Client Contract
 * Layer: Domain
 * Pattern: Gateway
 *
 * What the application layer needs from the remote catalog, without saying
 * how it is reached. ItunesClient (infrastructure) fulfils it over HTTP.
 */
import type { SearchRequest } from '@domain/entities/SearchRequest';
import type { SearchResult } from '@domain/entities/SearchResult';
import type { RequestOptions } from '@shared/types';

export interface IItunesClient {
  /** Dispatches to searchById() when `request.id` is set; term search otherwise. */
  search(request: SearchRequest | null | undefined, options?: RequestOptions): Promise<SearchResult>;

  /** Lookup by catalog identifier (track, collection or artist id). */
  searchById(id: string, options?: RequestOptions): Promise<SearchResult>;
}
