import type { Actor } from '../../domain/auth/user.js';
import { CafeRepo } from '../../infra/db/cafeRepo.js';
import { CommentRepo } from '../../infra/db/commentRepo.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';

export interface AddCommentCommand {
  actor: Actor | null;
  cafeId: number;
  text: string;
}

export class AddCommentUseCase {
  constructor(
    private cafeRepo: CafeRepo,
    private commentRepo: CommentRepo
  ) {}

  async execute({ actor, cafeId, text }: AddCommentCommand): Promise<number> {
    const cafe = await this.cafeRepo.findById(cafeId);
    if (!cafe) {
      throw new NotFoundError('Cafe not found');
    }
    if (!actor) {
      throw new UnauthorizedError('You need to login or register to comment.');
    }

    return this.commentRepo.create(cafe.id, actor.id, text);
  }
}
