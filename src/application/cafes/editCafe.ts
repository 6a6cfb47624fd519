import type { Actor } from '../../domain/auth/user.js';
import type { Cafe } from '../../domain/cafes/cafe.js';
import { canEditCafe } from '../../domain/cafes/policy.js';
import { CafeRepo } from '../../infra/db/cafeRepo.js';
import { DuplicateCafeNameError, ForbiddenError, NotFoundError } from '../errors.js';
import { assertValidRating, type CafeInput } from './createCafe.js';

export interface EditCafeCommand {
  actor: Actor;
  cafeId: number;
  cafe: CafeInput;
}

export class EditCafeUseCase {
  constructor(
    private cafeRepo: CafeRepo,
    private superAdminId: number
  ) {}

  /**
   * Load a cafe the actor is allowed to edit.
   */
  async load(actor: Actor | null, cafeId: number): Promise<Cafe> {
    const cafe = await this.cafeRepo.findById(cafeId);
    if (!cafe) {
      throw new NotFoundError('Cafe not found');
    }
    if (!canEditCafe(actor, cafe, this.superAdminId)) {
      throw new ForbiddenError();
    }
    return cafe;
  }

  async execute({ actor, cafeId, cafe }: EditCafeCommand): Promise<Cafe> {
    await this.load(actor, cafeId);
    assertValidRating(cafe.rating);

    const sameName = await this.cafeRepo.findByName(cafe.name);
    if (sameName && sameName.id !== cafeId) {
      throw new DuplicateCafeNameError();
    }

    const updated = await this.cafeRepo.update(cafeId, {
      name: cafe.name,
      summary: cafe.summary,
      rating: cafe.rating,
      body: cafe.body,
      imgUrl: cafe.imgUrl ?? null,
      contributorName: cafe.contributorName || actor.name,
    });
    if (!updated) {
      throw new NotFoundError('Cafe not found');
    }
    return updated;
  }
}
