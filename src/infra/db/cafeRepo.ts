import type { DbPool } from './pool.js';
import { isUniqueViolation } from './pool.js';
import type { Cafe, CafeDetails } from '../../domain/cafes/cafe.js';
import { DuplicateCafeNameError } from '../../application/errors.js';

interface CafeRow {
  id: number;
  name: string;
  summary: string;
  rating: number;
  body: string;
  img_url: string | null;
  posted_on: string;
  contributor_id: number;
  contributor_name: string;
}

const CAFE_COLUMNS =
  'id, name, summary, rating, body, img_url, posted_on, contributor_id, contributor_name';

function toCafe(row: CafeRow): Cafe {
  return {
    id: row.id,
    name: row.name,
    summary: row.summary,
    rating: row.rating,
    body: row.body,
    imgUrl: row.img_url,
    postedOn: row.posted_on,
    contributorId: row.contributor_id,
    contributorName: row.contributor_name,
  };
}

export interface NewCafe extends CafeDetails {
  contributorId: number;
  postedOn: string;
}

export class CafeRepo {
  constructor(private pool: DbPool) {}

  /**
   * All cafes in insertion order.
   */
  async list(): Promise<Cafe[]> {
    const result = await this.pool.query<CafeRow>(
      `SELECT ${CAFE_COLUMNS} FROM cafes ORDER BY id ASC`
    );
    return result.rows.map(toCafe);
  }

  async findById(id: number): Promise<Cafe | null> {
    const result = await this.pool.query<CafeRow>(
      `SELECT ${CAFE_COLUMNS} FROM cafes WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toCafe(result.rows[0]);
  }

  async findByName(name: string): Promise<Cafe | null> {
    const result = await this.pool.query<CafeRow>(
      `SELECT ${CAFE_COLUMNS} FROM cafes WHERE name = $1`,
      [name]
    );
    return result.rows.length === 0 ? null : toCafe(result.rows[0]);
  }

  async create(cafe: NewCafe): Promise<Cafe> {
    try {
      const result = await this.pool.query<CafeRow>(
        `INSERT INTO cafes (name, summary, rating, body, img_url, posted_on, contributor_id, contributor_name)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${CAFE_COLUMNS}`,
        [
          cafe.name,
          cafe.summary,
          cafe.rating,
          cafe.body,
          cafe.imgUrl,
          cafe.postedOn,
          cafe.contributorId,
          cafe.contributorName,
        ]
      );
      return toCafe(result.rows[0]);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new DuplicateCafeNameError();
      }
      throw error;
    }
  }

  /**
   * Overwrite every mutable field. Returns null if the cafe no longer exists.
   */
  async update(id: number, details: CafeDetails): Promise<Cafe | null> {
    try {
      const result = await this.pool.query<CafeRow>(
        `UPDATE cafes
         SET name = $2, summary = $3, rating = $4, body = $5, img_url = $6, contributor_name = $7
         WHERE id = $1
         RETURNING ${CAFE_COLUMNS}`,
        [
          id,
          details.name,
          details.summary,
          details.rating,
          details.body,
          details.imgUrl,
          details.contributorName,
        ]
      );
      return result.rows.length === 0 ? null : toCafe(result.rows[0]);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new DuplicateCafeNameError();
      }
      throw error;
    }
  }

  /**
   * Delete a cafe together with its comments.
   * Returns the number of comments removed, or null if the cafe did not exist.
   */
  async delete(id: number): Promise<number | null> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const comments = await client.query<{ id: number }>(
        'DELETE FROM comments WHERE cafe_id = $1 RETURNING id',
        [id]
      );
      const cafes = await client.query<{ id: number }>(
        'DELETE FROM cafes WHERE id = $1 RETURNING id',
        [id]
      );
      await client.query('COMMIT');
      return cafes.rows.length === 0 ? null : comments.rows.length;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
