/**
 * iTunes Client — Search & Lookup over HTTP
 * Layer: Infrastructure
 * Pattern: Gateway (implements IItunesClient)
 *
 * I own the two request paths against the public catalog:
 *
 *   search(request)  → GET <searchUrl>?term=...&entity=...   (query from the encoder)
 *   searchById(id)   → GET <lookupUrl>?id=<id>
 *
 * search() dispatches: a request carrying a non-empty `id` is a lookup and
 * nothing else in it is read. Both paths end in fetchResult(), which applies
 * the deadline, checks the status, reads the whole body and decodes it.
 *
 * No retries and no partial results: every failure is thrown as one of the
 * AppError subclasses and left to the caller. The transport, logger and
 * endpoints are injected so tests run against an in-process fake.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SearchRequest } from '@domain/entities/SearchRequest';
import type { SearchResult } from '@domain/entities/SearchResult';
import type { HttpResponse, HttpTransport } from '@domain/interfaces/IHttpTransport';
import type { IItunesClient } from '@domain/interfaces/IItunesClient';
import {
  AppError,
  RequestCancelledError,
  TransportError,
  UnexpectedStatusError,
  ValidationError,
} from '@shared/errors/AppError';
import type { RequestOptions } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { encodeSearchRequest } from './queryEncoder';
import { RequestDeadline } from './RequestDeadline';
import { decodeSearchResult } from './responseDecoder';

export interface ItunesClientOptions {
  searchUrl: string;
  lookupUrl: string;
  timeoutMs: number;
  userAgent: string;
}

@injectable()
export class ItunesClient implements IItunesClient {
  constructor(
    @inject(TOKENS.HttpTransport) private transport: HttpTransport,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.ItunesClientOptions) private options: ItunesClientOptions,
  ) {}

  async search(
    request: SearchRequest | null | undefined,
    options: RequestOptions = {},
  ): Promise<SearchResult> {
    if (request == null) {
      throw new ValidationError('Search request is required');
    }

    if (request.id) {
      return this.searchById(request.id, options);
    }

    const url = this.buildUrl(this.options.searchUrl, encodeSearchRequest(request));
    return this.fetchResult(url, options.signal);
  }

  async searchById(id: string, options: RequestOptions = {}): Promise<SearchResult> {
    const trimmed = id.trim();
    if (!trimmed) {
      throw new ValidationError('Lookup id is required');
    }

    const url = this.buildUrl(this.options.lookupUrl, new URLSearchParams({ id: trimmed }));
    return this.fetchResult(url, options.signal);
  }

  private buildUrl(base: string, params: URLSearchParams): string {
    const url = new URL(base);
    for (const [key, value] of params) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  private async fetchResult(url: string, signal?: AbortSignal): Promise<SearchResult> {
    const deadline = new RequestDeadline(this.options.timeoutMs, signal);
    const startMs = Date.now();

    try {
      if (deadline.reason) {
        throw new RequestCancelledError(deadline.reason, url);
      }

      this.log.debug({ url }, 'iTunes request');

      let res: HttpResponse;
      try {
        res = await this.transport(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            'User-Agent': this.options.userAgent,
          },
          signal: deadline.signal,
        });
      } catch (err) {
        throw this.toTransportError(err, url, deadline);
      }

      if (res.status < 200 || res.status > 299) {
        await this.discardBody(res);
        throw new UnexpectedStatusError(res.status, res.statusText);
      }

      let body: string;
      try {
        body = await res.text();
      } catch (err) {
        throw this.toTransportError(err, url, deadline);
      }

      const result = decodeSearchResult(body);

      this.log.debug(
        {
          url,
          status: res.status,
          resultCount: result.resultCount,
          durationMs: Date.now() - startMs,
        },
        'iTunes response',
      );
      return result;
    } finally {
      deadline.dispose();
    }
  }

  private toTransportError(err: unknown, url: string, deadline: RequestDeadline): AppError {
    if (deadline.reason) {
      return new RequestCancelledError(deadline.reason, url, err);
    }
    if (err instanceof AppError) {
      return err;
    }
    const detail = err instanceof Error ? err.message : String(err);
    return new TransportError(`Request failed: ${url}: ${detail}`, err);
  }

  /** Releases the connection when the body will not be read. */
  private async discardBody(res: HttpResponse): Promise<void> {
    if (!res.body || res.bodyUsed) return;
    try {
      await res.body.cancel();
    } catch (err) {
      this.log.debug({ err }, 'Failed to discard upstream response body');
    }
  }
}
