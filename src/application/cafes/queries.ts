import type { Cafe, Comment } from '../../domain/cafes/cafe.js';
import { CafeRepo } from '../../infra/db/cafeRepo.js';
import { CommentRepo } from '../../infra/db/commentRepo.js';
import { NotFoundError } from '../errors.js';

export interface CafeWithComments {
  cafe: Cafe;
  comments: Comment[];
}

export class CafeQueries {
  constructor(
    private cafeRepo: CafeRepo,
    private commentRepo: CommentRepo
  ) {}

  async listCafes(): Promise<Cafe[]> {
    return this.cafeRepo.list();
  }

  async getCafe(cafeId: number): Promise<CafeWithComments> {
    const cafe = await this.cafeRepo.findById(cafeId);
    if (!cafe) {
      throw new NotFoundError('Cafe not found');
    }
    const comments = await this.commentRepo.listForCafe(cafeId);
    return { cafe, comments };
  }
}
