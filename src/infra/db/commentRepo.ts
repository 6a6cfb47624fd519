import type { DbPool } from './pool.js';
import type { Comment } from '../../domain/cafes/cafe.js';

interface CommentRow {
  id: number;
  text: string;
  cafe_id: number;
  author_id: number;
  author_name: string;
  author_email: string;
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    text: row.text,
    cafeId: row.cafe_id,
    authorId: row.author_id,
    authorName: row.author_name,
    authorEmail: row.author_email,
  };
}

export class CommentRepo {
  constructor(private pool: DbPool) {}

  /**
   * Comments on a cafe, oldest first, with their author's live name and email.
   */
  async listForCafe(cafeId: number): Promise<Comment[]> {
    const result = await this.pool.query<CommentRow>(
      `SELECT c.id, c.text, c.cafe_id, c.author_id, u.name AS author_name, u.email AS author_email
       FROM comments c
       JOIN users u ON u.id = c.author_id
       WHERE c.cafe_id = $1
       ORDER BY c.id ASC`,
      [cafeId]
    );
    return result.rows.map(toComment);
  }

  async create(cafeId: number, authorId: number, text: string): Promise<number> {
    const result = await this.pool.query<{ id: number }>(
      'INSERT INTO comments (text, author_id, cafe_id) VALUES ($1, $2, $3) RETURNING id',
      [text, authorId, cafeId]
    );
    return result.rows[0].id;
  }
}
