/**
 * Search Result — The Decoded Catalog Payload
 * Layer: Domain
 *
 * Field names are the remote JSON keys as documented, so decoding is a
 * straight schema check with no renaming. The remote service omits keys that
 * do not apply to an item's kind (a podcast has no trackNumber), hence every
 * item field is optional.
 */
export interface ResultItem {
  kind?: string;
  trackId?: number;
  collectionId?: number;
  artistName?: string;
  trackPrice?: number;
  country?: string;
  currency?: string;
  collectionName?: string;
  primaryGenreName?: string;
  trackName?: string;
  trackCensoredName?: string;
  trackNumber?: number;
  trackTimeMillis?: number;
  trackViewUrl?: string;
  collectionPrice?: number;
  collectionViewUrl?: string;
  artistViewUrl?: string;
  previewUrl?: string;
  isStreamable?: boolean;
  artworkUrl100?: string;
  artworkUrl60?: string;
  artworkUrl30?: string;
}

export interface SearchResult {
  resultCount: number;
  results: ResultItem[];
}
