import type { Review } from "../github/types.js";

/**
 * One effective review per reviewer: the latest by submittedAt; on equal timestamps
 * the later element of the input wins. Reviewers match case-insensitively.
 * Result keeps the input order of the winning reviews, so collapsing twice is a no-op.
 */
export function collapseReviews(reviews: readonly Review[]): Review[] {
  const winners = new Map<string, { index: number; time: number }>();

  reviews.forEach((review, index) => {
    const key = review.reviewer.toLowerCase();
    const time = Date.parse(review.submittedAt);
    const current = winners.get(key);
    if (!current || !(time < current.time)) {
      winners.set(key, { index, time });
    }
  });

  const keep = new Set([...winners.values()].map((w) => w.index));
  return reviews.filter((_, index) => keep.has(index));
}
