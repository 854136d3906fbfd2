/**
 * Entity values accepted by the search endpoint's `entity` parameter.
 * Closed set: the remote service rejects anything else with a 400.
 */
export const ENTITIES = {
  MOVIE: 'movie',
  MOVIE_ARTIST: 'movieArtist',
  PODCAST: 'podcast',
  PODCAST_AUTHOR: 'podcastAuthor',
  MUSIC: 'music',
  MUSIC_VIDEO: 'musicVideo',
  MUSIC_ARTIST: 'musicArtist',
  AUDIOBOOK: 'audiobook',
  AUDIOBOOK_AUTHOR: 'audiobookAuthor',
  SHORT_FILM: 'shortFilm',
  SHORT_FILM_ARTIST: 'shortFilmArtist',
  TV_SHOW: 'tvShow',
  TV_EPISODE: 'tvEpisode',
  TV_SEASON: 'tvSeason',
  SOFTWARE: 'software',
  IPAD_SOFTWARE: 'iPadSoftware',
  MAC_SOFTWARE: 'macSoftware',
  EBOOK: 'ebook',
  ALL: 'all',
  ALL_TRACK: 'allTrack',
} as const;

/** Media types documented for the search endpoint's `media` parameter. */
export const MEDIA_TYPES = [
  'movie',
  'podcast',
  'music',
  'musicVideo',
  'audiobook',
  'shortFilm',
  'tvShow',
  'software',
  'ebook',
  'all',
] as const;

/** Upper bound the search endpoint accepts for `limit`. */
export const MAX_SEARCH_LIMIT = 200;
