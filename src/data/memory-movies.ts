/**
 * In-memory movie store, for development and tests.
 *
 * @module marquee/data/memory-movies
 */

import {
  type Movie,
  type MovieDraft,
  type MovieFilters,
  type MoviePage,
  type MovieSort,
  MOVIE_SORT_COLUMNS,
  type MovieStore,
} from "./movies.ts";
import { type PageRequest, pageOffset, sortDirection } from "./pagination.ts";

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Map-backed {@link MovieStore}. Reads hand out copies, so callers never
 * hold a reference into the store.
 */
export class MemoryMovieStore implements MovieStore {
  private movies = new Map<number, Movie>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(draft: MovieDraft): Promise<Movie> {
    const movie: Movie = {
      ...structuredClone(draft),
      id: this.nextId++,
      createdAt: this.now(),
      version: 1,
    };
    this.movies.set(movie.id, movie);
    return structuredClone(movie);
  }

  async get(id: number): Promise<Movie | null> {
    const movie = this.movies.get(id);
    return movie ? structuredClone(movie) : null;
  }

  async update(candidate: Movie): Promise<number | null> {
    const stored = this.movies.get(candidate.id);
    if (!stored || stored.version !== candidate.version) {
      return null;
    }
    const version = stored.version + 1;
    this.movies.set(candidate.id, {
      ...structuredClone(candidate),
      createdAt: stored.createdAt,
      version,
    });
    return version;
  }

  async delete(id: number): Promise<boolean> {
    return this.movies.delete(id);
  }

  async list(
    filters: MovieFilters,
    page: PageRequest<MovieSort>,
  ): Promise<MoviePage> {
    const title = filters.title?.toLowerCase() ?? "";
    const genres = filters.genres ?? [];
    const column = MOVIE_SORT_COLUMNS[page.sort];
    const direction = sortDirection(page.sort) === "DESC" ? -1 : 1;

    const matches = [...this.movies.values()]
      .filter((m) => m.title.toLowerCase().includes(title))
      .filter((m) => genres.every((g) => m.genres.includes(g)))
      .sort((a, b) =>
        direction * compareValues(a[column], b[column]) || a.id - b.id
      );

    const offset = pageOffset(page);
    return {
      movies: matches
        .slice(offset, offset + page.pageSize)
        .map((m) => structuredClone(m)),
      totalRecords: matches.length,
    };
  }
}
