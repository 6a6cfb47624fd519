import type { Actor } from '../../domain/auth/user.js';
import { formatPostedOn, isValidRating, type Cafe } from '../../domain/cafes/cafe.js';
import { InvalidRatingError } from '../../domain/cafes/errors.js';
import { CafeRepo } from '../../infra/db/cafeRepo.js';
import { DuplicateCafeNameError } from '../errors.js';

/**
 * Cafe fields as submitted. A blank contributor name falls back to the actor's name.
 */
export interface CafeInput {
  name: string;
  summary: string;
  rating: number;
  body: string;
  imgUrl?: string;
  contributorName?: string;
}

export interface CreateCafeCommand {
  actor: Actor;
  cafe: CafeInput;
}

export function assertValidRating(rating: number): void {
  if (!isValidRating(rating)) {
    throw new InvalidRatingError();
  }
}

export class CreateCafeUseCase {
  constructor(
    private cafeRepo: CafeRepo,
    private now: () => Date = () => new Date()
  ) {}

  async execute({ actor, cafe }: CreateCafeCommand): Promise<Cafe> {
    assertValidRating(cafe.rating);

    const existing = await this.cafeRepo.findByName(cafe.name);
    if (existing) {
      throw new DuplicateCafeNameError();
    }

    return this.cafeRepo.create({
      name: cafe.name,
      summary: cafe.summary,
      rating: cafe.rating,
      body: cafe.body,
      imgUrl: cafe.imgUrl ?? null,
      contributorName: cafe.contributorName || actor.name,
      contributorId: actor.id,
      postedOn: formatPostedOn(this.now()),
    });
  }
}
