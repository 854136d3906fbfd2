/**
 * Catalog Controller — HTTP Boundary for Search & Lookup
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: validate the query/path, build a SearchRequest, call
 * CatalogService, send JSON. Arrow-function handlers keep `this` bound when
 * Express invokes them.
 *
 * If the downstream client hangs up before we answer, the upstream request
 * is aborted too (see abortOnClose).
 */
import { CatalogService } from '@application/services/CatalogService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { SearchRequest } from '@domain/entities/SearchRequest';
import type { SearchResult } from '@domain/entities/SearchResult';
import { lookupParamsSchema, searchQuerySchema } from '@interfaces/http/schemas/catalogSchemas';
import { validate } from '@interfaces/http/middleware/validation';
import type { TimedResult } from '@shared/types';
import type { Request, Response } from 'express';

function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export class CatalogController {
  private service: CatalogService;

  constructor() {
    this.service = container.resolve<CatalogService>(TOKENS.CatalogService);
  }

  search = async (req: Request, res: Response): Promise<void> => {
    const input = validate(searchQuerySchema, req.query);

    const request: SearchRequest = {
      term: input.term,
      country: input.country,
      media: input.media,
      entity: input.entity,
      attribute: input.attribute,
      lang: input.lang,
      limit: input.limit,
      version: input.version,
      explicit: input.explicit,
      id: input.id,
    };

    const result = await this.service.search(request, { signal: abortOnClose(res) });
    this.send(req, res, result);
  };

  lookup = async (req: Request, res: Response): Promise<void> => {
    const { id } = validate(lookupParamsSchema, req.params);

    const result = await this.service.lookup(id, { signal: abortOnClose(res) });
    this.send(req, res, result);
  };

  private send(req: Request, res: Response, result: TimedResult<SearchResult>): void {
    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json({
      status: 'success',
      resultCount: result.data.resultCount,
      results: result.data.results,
      meta: {
        ...(totalTimeMs != null && { totalTimeMs }),
        upstreamTimeMs: result.upstreamTimeMs,
      },
    });
  }
}
