export const MIN_RATING = 1;
export const MAX_RATING = 10;

/**
 * A reviewed entry in the directory.
 * `contributorName` is captured when the entry is saved and may drift from the user's name.
 */
export interface Cafe {
  readonly id: number;
  readonly name: string;
  readonly summary: string;
  readonly rating: number;
  readonly body: string;
  readonly imgUrl: string | null;
  readonly postedOn: string;
  readonly contributorId: number;
  readonly contributorName: string;
}

/**
 * The fields an edit may overwrite.
 */
export interface CafeDetails {
  name: string;
  summary: string;
  rating: number;
  body: string;
  imgUrl: string | null;
  contributorName: string;
}

export interface Comment {
  readonly id: number;
  readonly text: string;
  readonly cafeId: number;
  readonly authorId: number;
  readonly authorName: string;
  readonly authorEmail: string;
}

export function isValidRating(rating: number): boolean {
  return Number.isInteger(rating) && rating >= MIN_RATING && rating <= MAX_RATING;
}

/**
 * Calendar date in the "October 05, 2026" form shown on each entry.
 */
export function formatPostedOn(date: Date): string {
  return date.toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'long',
    day: '2-digit',
  });
}
