/**
 * Unit Tests — CatalogService
 *
 * The client is mocked: the service's job is delegation, timing, and the
 * lookup not-found policy, none of which needs HTTP.
 */
import { CatalogService } from '@application/services/CatalogService';
import type { IItunesClient } from '@domain/interfaces/IItunesClient';
import { NotFoundError, UnexpectedStatusError } from '@shared/errors/AppError';
import pino from 'pino';

import { sampleSearchRequest, sampleSearchResult } from '../helpers/fixtures';
import { silentLogger } from '../helpers/mockTransport';

describe('CatalogService', () => {
  let service: CatalogService;
  let mockClient: jest.Mocked<IItunesClient>;

  beforeEach(() => {
    mockClient = {
      search: jest.fn(),
      searchById: jest.fn(),
    };
    service = new CatalogService(mockClient, silentLogger);
  });

  describe('search()', () => {
    it('should delegate to the client with the request and options', async () => {
      mockClient.search.mockResolvedValue(sampleSearchResult);
      const signal = new AbortController().signal;

      const result = await service.search(sampleSearchRequest, { signal });

      expect(mockClient.search).toHaveBeenCalledWith(sampleSearchRequest, { signal });
      expect(result.data).toEqual(sampleSearchResult);
      expect(result.upstreamTimeMs).toBeGreaterThanOrEqual(0);
    });

    it('should return an empty collection as-is', async () => {
      mockClient.search.mockResolvedValue({ resultCount: 0, results: [] });

      const result = await service.search({ term: 'zzzz' });

      expect(result.data).toEqual({ resultCount: 0, results: [] });
    });

    it('should propagate errors from the client', async () => {
      mockClient.search.mockRejectedValue(new UnexpectedStatusError(503, 'Service Unavailable'));

      await expect(service.search(sampleSearchRequest)).rejects.toThrow(UnexpectedStatusError);
    });
  });

  describe('lookup()', () => {
    it('should return the looked-up items', async () => {
      mockClient.searchById.mockResolvedValue(sampleSearchResult);

      const result = await service.lookup('1440857781');

      expect(mockClient.searchById).toHaveBeenCalledWith('1440857781', {});
      expect(result.data.results).toHaveLength(1);
    });

    it('should throw NotFoundError when the lookup finds nothing', async () => {
      mockClient.searchById.mockResolvedValue({ resultCount: 0, results: [] });

      await expect(service.lookup(' 42 ')).rejects.toThrow(NotFoundError);
      await expect(service.lookup(' 42 ')).rejects.toThrow('Catalog item not found: 42');
    });

    it('should log the trimmed id it reports', async () => {
      const logger = pino({ level: 'silent' });
      const debugSpy = jest.spyOn(logger, 'debug');
      const logged = new CatalogService(mockClient, logger);
      mockClient.searchById.mockResolvedValue(sampleSearchResult);

      await logged.lookup('  1440857781\n');

      expect(debugSpy).toHaveBeenCalledWith(
        expect.objectContaining({ id: '1440857781', resultCount: 1 }),
        'Catalog lookup complete',
      );
    });
  });
});
