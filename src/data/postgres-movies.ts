/**
 * Postgres movie store.
 *
 * @module marquee/data/postgres-movies
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
import {
  type Queryable,
  readDate,
  readInt,
  readString,
  readStringArray,
  type Row,
  withDeadline,
} from "./postgres.ts";

const MOVIE_COLUMNS = "id, created_at, title, year, runtime, genres, version";

function toMovie(row: Row): Movie {
  return {
    id: readInt(row, "id"),
    createdAt: readDate(row, "created_at"),
    title: readString(row, "title"),
    year: readInt(row, "year"),
    runtime: readInt(row, "runtime"),
    genres: readStringArray(row, "genres"),
    version: readInt(row, "version"),
  };
}

/** Escape LIKE wildcards so the filter matches literally */
function likeLiteral(text: string): string {
  return text.replace(/[\\%_]/g, "\\$&");
}

/**
 * {@link MovieStore} over the `movies` table.
 *
 * Every statement runs under the operation timeout; failures and
 * overruns reject with StorageError.
 */
export class PostgresMovieStore implements MovieStore {
  constructor(
    private readonly db: Queryable,
    private readonly timeoutMs: number,
  ) {}

  insert(draft: MovieDraft): Promise<Movie> {
    return withDeadline(this.timeoutMs, "movies.insert", async () => {
      const result = await this.db.query(
        `INSERT INTO movies (title, year, runtime, genres)
         VALUES ($1, $2, $3, $4)
         RETURNING id, created_at, version`,
        [draft.title, draft.year, draft.runtime, draft.genres],
      );
      const row = result.rows[0];
      if (!row) throw new Error("insert returned no row");
      return {
        ...draft,
        genres: [...draft.genres],
        id: readInt(row, "id"),
        createdAt: readDate(row, "created_at"),
        version: readInt(row, "version"),
      };
    });
  }

  get(id: number): Promise<Movie | null> {
    return withDeadline(this.timeoutMs, "movies.get", async () => {
      if (id < 1) return null;
      const result = await this.db.query(
        `SELECT ${MOVIE_COLUMNS} FROM movies WHERE id = $1`,
        [id],
      );
      const row = result.rows[0];
      return row ? toMovie(row) : null;
    });
  }

  update(candidate: Movie): Promise<number | null> {
    return withDeadline(this.timeoutMs, "movies.update", async () => {
      const result = await this.db.query(
        `UPDATE movies
         SET title = $1, year = $2, runtime = $3, genres = $4, version = version + 1
         WHERE id = $5 AND version = $6
         RETURNING version`,
        [
          candidate.title,
          candidate.year,
          candidate.runtime,
          candidate.genres,
          candidate.id,
          candidate.version,
        ],
      );
      const row = result.rows[0];
      return row ? readInt(row, "version") : null;
    });
  }

  delete(id: number): Promise<boolean> {
    return withDeadline(this.timeoutMs, "movies.delete", async () => {
      if (id < 1) return false;
      const result = await this.db.query("DELETE FROM movies WHERE id = $1", [
        id,
      ]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  list(
    filters: MovieFilters,
    page: PageRequest<MovieSort>,
  ): Promise<MoviePage> {
    // Column and direction come from the sort safelist, never from raw input
    const column = MOVIE_SORT_COLUMNS[page.sort];
    const direction = sortDirection(page.sort);
    return withDeadline(this.timeoutMs, "movies.list", async () => {
      const result = await this.db.query(
        `SELECT count(*) OVER() AS total_records, ${MOVIE_COLUMNS}
         FROM movies
         WHERE (title ILIKE '%' || $1 || '%' OR $1 = '')
         AND (genres @> $2 OR $2 = '{}')
         ORDER BY ${column} ${direction}, id ASC
         LIMIT $3 OFFSET $4`,
        [
          likeLiteral(filters.title ?? ""),
          filters.genres ?? [],
          page.pageSize,
          pageOffset(page),
        ],
      );
      const first = result.rows[0];
      return {
        movies: result.rows.map(toMovie),
        totalRecords: first ? readInt(first, "total_records") : 0,
      };
    });
  }
}
