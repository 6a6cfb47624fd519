import type { Actor } from '../../domain/auth/user.js';
import { isSuperAdmin } from '../../domain/cafes/policy.js';
import { CafeRepo } from '../../infra/db/cafeRepo.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export interface DeleteCafeResult {
  cafeId: number;
  deletedComments: number;
}

export class DeleteCafeUseCase {
  constructor(
    private cafeRepo: CafeRepo,
    private superAdminId: number
  ) {}

  /**
   * Permission is checked before existence so non-admins learn nothing about ids.
   */
  async execute(actor: Actor | null, cafeId: number): Promise<DeleteCafeResult> {
    if (!isSuperAdmin(actor, this.superAdminId)) {
      throw new ForbiddenError();
    }

    const deletedComments = await this.cafeRepo.delete(cafeId);
    if (deletedComments === null) {
      throw new NotFoundError('Cafe not found');
    }

    return { cafeId, deletedComments };
  }
}
