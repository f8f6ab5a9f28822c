import { CatalogLoadError } from "./errors";
import {
    isRecord,
    readJsonFile,
    requireArray,
    requirePositiveInteger,
    requireRating,
    requireString,
} from "./records";
import type { Review } from "./types";

export type ReviewService = {
    getReviewsForMovie(movieId: number): Review[];
};

function parseReview(raw: unknown, index: number): Review {
    const at = `reviews[${index}]`;
    if (!isRecord(raw)) {
        throw new CatalogLoadError(`${at} 항목은 객체여야 합니다.`);
    }
    return Object.freeze({
        movieId: requirePositiveInteger(raw, "movieId", at),
        userName: requireString(raw, "userName", at),
        avatarName: requireString(raw, "avatarName", at),
        rating: requireRating(raw, "rating", at),
        comment: requireString(raw, "comment", at),
    });
}

export function parseReviews(raw: unknown): readonly Review[] {
    return Object.freeze(requireArray(raw, "reviews").map(parseReview));
}

export async function loadReviews(filePath: string): Promise<readonly Review[]> {
    return parseReviews(await readJsonFile(filePath));
}

export function createReviewService(reviews: readonly Review[]): ReviewService {
    const reviewsByMovie = reviews.reduce<Map<number, Review[]>>((acc, review) => {
        const list = acc.get(review.movieId) ?? [];
        list.push(review);
        acc.set(review.movieId, list);
        return acc;
    }, new Map());

    return {
        getReviewsForMovie: (movieId) => [...(reviewsByMovie.get(movieId) ?? [])],
    };
}

export function averageRating(reviews: readonly Review[]): number | null {
    if (!reviews.length) return null;
    const total = reviews.reduce((sum, review) => sum + review.rating, 0);
    return Math.round((total / reviews.length) * 10) / 10;
}
