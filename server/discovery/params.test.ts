import { describe, it, expect } from 'vitest';
import { ValidationError } from '../common/errors';
import {
  clampInt,
  param,
  parseBoxOfficeParams,
  parseGenreParams,
  parseRatingTargets,
  parseSearchParams,
  parseTitleTarget,
} from './params';

describe('param / clampInt', () => {
  it('reads the first value and treats blanks as absent', () => {
    expect(param({ q: ['Heat', 'Alien'] }, 'q')).toBe('Heat');
    expect(param({ q: '  ' }, 'q')).toBeUndefined();
    expect(param(undefined, 'q')).toBeUndefined();
  });

  it('clamps integers and falls back on junk', () => {
    expect(clampInt('0', 1, 1, 10)).toBe(1);
    expect(clampInt('99', 1, 1, 10)).toBe(10);
    expect(clampInt('abc', 1, 1, 10)).toBe(1);
    expect(clampInt('2.5', 1, 1, 10)).toBe(1);
    expect(clampInt(undefined, 7, 5, 10)).toBe(7);
  });
});

describe('parseSearchParams', () => {
  it('parses a full query', () => {
    expect(
      parseSearchParams({ q: ' Avenger ', page: '2', per_page: '3', type: 'movie', year: '2012', language: 'English', sort: 'rating' }),
    ).toEqual({
      query: 'Avenger',
      page: 2,
      pageSize: 5,
      type: 'movie',
      year: '2012',
      language: 'English',
      sort: 'rating',
    });
  });

  it('defaults paging', () => {
    expect(parseSearchParams({ q: 'Heat' })).toEqual({ query: 'Heat', page: 1, pageSize: 10 });
  });

  it('requires q and caps its length', () => {
    expect(() => parseSearchParams({})).toThrow("Query parameter 'q' is required.");
    expect(() => parseSearchParams({ q: 'x'.repeat(101) })).toThrow('Query must be 100 characters or fewer.');
  });

  it('rejects unknown types, malformed years and unknown sorts', () => {
    expect(() => parseSearchParams({ q: 'Heat', type: 'game' })).toThrow('type must be one of movie, series, episode');
    expect(() => parseSearchParams({ q: 'Heat', year: '95' })).toThrow('year must be a four-digit number');
    expect(() => parseSearchParams({ q: 'Heat', sort: 'title_asc' })).toThrow(ValidationError);
  });
});

describe('parseGenreParams', () => {
  it('falls back to rating_desc for unknown sorts', () => {
    expect(parseGenreParams('Action', { sort: 'sideways', page: '12' })).toEqual({
      genre: 'Action',
      page: 10,
      sort: 'rating_desc',
    });
  });

  it('parses filters', () => {
    expect(parseGenreParams('Drama', { year: '199', language: 'French', rating: '7.5', sort: 'year_asc' })).toEqual({
      genre: 'Drama',
      page: 1,
      sort: 'year_asc',
      year: '199',
      language: 'French',
      minRating: 7.5,
    });
  });

  it('rejects a non-numeric rating', () => {
    expect(() => parseGenreParams('Drama', { rating: 'high' })).toThrow('rating must be numeric');
  });
});

describe('parseBoxOfficeParams', () => {
  it('defaults to box_office_desc without a query', () => {
    expect(parseBoxOfficeParams({})).toEqual({ page: 1, sort: 'box_office_desc' });
  });

  it('keeps query, genre and a known sort', () => {
    expect(parseBoxOfficeParams({ q: 'Batman', genre: 'Action', sort: 'title_desc', page: '3' })).toEqual({
      page: 3,
      sort: 'title_desc',
      query: 'Batman',
      genre: 'Action',
    });
  });
});

describe('parseTitleTarget', () => {
  it('prefers title, then imdbID, then id', () => {
    expect(parseTitleTarget({ title: 'Heat', imdbID: 'tt0113277' })).toBe('Heat');
    expect(parseTitleTarget({ id: 'tt0113277' })).toBe('tt0113277');
    expect(() => parseTitleTarget({})).toThrow(ValidationError);
  });
});

describe('parseRatingTargets', () => {
  it('reads ids before titles from the query', () => {
    expect(parseRatingTargets({ titles: 'Heat, Alien,,', title: 'Jaws', imdbID: 'tt0848228' })).toEqual([
      'tt0848228',
      'Heat',
      'Alien',
      'Jaws',
    ]);
  });

  it('reads string entries from a POST body', () => {
    expect(parseRatingTargets({}, { titles: ['Heat', 3, ' '], ids: ['tt1'] })).toEqual(['tt1', 'Heat']);
  });

  it('requires at least one target', () => {
    expect(() => parseRatingTargets({})).toThrow(ValidationError);
    expect(() => parseRatingTargets({}, { titles: [] })).toThrow(ValidationError);
  });
});
