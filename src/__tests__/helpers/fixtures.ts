/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Catalog payloads in the upstream JSON shape, plus the client options every
 * unit test uses. Ids and names are made up.
 */
import type { SearchRequest } from '@domain/entities/SearchRequest';
import type { ResultItem, SearchResult } from '@domain/entities/SearchResult';
import type { ItunesClientOptions } from '@infrastructure/itunes/ItunesClient';

export const clientOptions: ItunesClientOptions = {
  searchUrl: 'https://itunes.apple.com/search',
  lookupUrl: 'https://itunes.apple.com/lookup',
  timeoutMs: 5000,
  userAgent: 'itunes-catalog-test',
};

/** A fully populated track, as the search endpoint returns it. */
export const sampleTrack: ResultItem = {
  kind: 'song',
  trackId: 1440857781,
  collectionId: 1440857001,
  artistName: 'The Placeholders',
  trackPrice: 1.29,
  country: 'USA',
  currency: 'USD',
  collectionName: 'Sample Sessions',
  primaryGenreName: 'Alternative',
  trackName: 'Change Of Plans',
  trackCensoredName: 'Change Of Plans',
  trackNumber: 3,
  trackTimeMillis: 215000,
  trackViewUrl: 'https://music.apple.com/us/album/change-of-plans/1440857001?i=1440857781',
  collectionPrice: 9.99,
  collectionViewUrl: 'https://music.apple.com/us/album/sample-sessions/1440857001',
  artistViewUrl: 'https://music.apple.com/us/artist/the-placeholders/1000001',
  previewUrl: 'https://audio.example.test/preview/1440857781.m4a',
  isStreamable: true,
  artworkUrl100: 'https://images.example.test/1440857001/100x100bb.jpg',
  artworkUrl60: 'https://images.example.test/1440857001/60x60bb.jpg',
  artworkUrl30: 'https://images.example.test/1440857001/30x30bb.jpg',
};

export const sampleSearchResult: SearchResult = {
  resultCount: 1,
  results: [sampleTrack],
};

/** Lookup body with the whitespace the lookup endpoint pads it with. */
export const sampleLookupBody =
  '\n\n\n{"resultCount":1,"results":[{"trackId":263058648,"trackName":"Example"}]}\n';

export const emptyResultBody = '{"resultCount":0,"results":[]}';

export const sampleSearchRequest: SearchRequest = {
  term: 'Change',
  limit: 12,
};
