import { loadCatalog } from "./catalog";
import { getConfig } from "./config";
import { createMovieService, type MovieService } from "./movie-service";
import { createReviewService, loadReviews, type ReviewService } from "./reviews";

export type CatalogServices = {
    movies: MovieService;
    reviews: ReviewService;
};

// Next.js dev 환경(HMR)에서도 카탈로그를 한 번만 읽도록 globalThis에 저장
const globalForCatalog = globalThis as unknown as {
    __movieCatalogServices?: Promise<CatalogServices>;
};

async function buildServices(): Promise<CatalogServices> {
    const config = getConfig();
    const [catalog, reviews] = await Promise.all([
        loadCatalog(config.moviesDataFile),
        loadReviews(config.reviewsDataFile),
    ]);
    console.info(
        `[catalog] loaded ${catalog.length} movies and ${reviews.length} reviews from ${config.moviesDataFile}`
    );
    return {
        movies: createMovieService(catalog),
        reviews: createReviewService(reviews),
    };
}

export function getServices(): Promise<CatalogServices> {
    const cached = globalForCatalog.__movieCatalogServices;
    if (cached) return cached;

    const pending = buildServices();
    globalForCatalog.__movieCatalogServices = pending;
    // 로드에 실패하면 다음 요청에서 다시 시도
    pending.catch(() => {
        if (globalForCatalog.__movieCatalogServices === pending) {
            globalForCatalog.__movieCatalogServices = undefined;
        }
    });
    return pending;
}

export async function getMovieService(): Promise<MovieService> {
    return (await getServices()).movies;
}
