/**
 * Catalog Service — The Orchestrator
 * Layer: Application
 * Pattern: Facade
 *
 * Sits between the HTTP controller and the iTunes client:
 *   1. search(): hands the request to the client (which does the term/id
 *      dispatch) and times the upstream round trip.
 *   2. lookup(): id lookup that turns an empty result into NotFoundError,
 *      so the facade can answer 404 instead of an empty 200.
 *
 * @injectable so the container wires the client and logger; the controller
 * resolves it via TOKENS.CatalogService.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SearchRequest } from '@domain/entities/SearchRequest';
import type { SearchResult } from '@domain/entities/SearchResult';
import type { IItunesClient } from '@domain/interfaces/IItunesClient';
import { NotFoundError } from '@shared/errors/AppError';
import type { RequestOptions, TimedResult } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class CatalogService {
  constructor(
    @inject(TOKENS.ItunesClient) private client: IItunesClient,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async search(
    request: SearchRequest,
    options: RequestOptions = {},
  ): Promise<TimedResult<SearchResult>> {
    const startMs = Date.now();
    const data = await this.client.search(request, options);
    const upstreamTimeMs = Date.now() - startMs;

    this.log.debug(
      { mode: request.id ? 'lookup' : 'search', resultCount: data.resultCount, upstreamTimeMs },
      'Catalog search complete',
    );
    return { data, upstreamTimeMs };
  }

  async lookup(id: string, options: RequestOptions = {}): Promise<TimedResult<SearchResult>> {
    const startMs = Date.now();
    const data = await this.client.searchById(id, options);
    const upstreamTimeMs = Date.now() - startMs;

    const trimmedId = id.trim();
    if (data.results.length === 0) {
      throw new NotFoundError('Catalog item', trimmedId);
    }

    this.log.debug(
      { id: trimmedId, resultCount: data.resultCount, upstreamTimeMs },
      'Catalog lookup complete',
    );
    return { data, upstreamTimeMs };
  }
}
