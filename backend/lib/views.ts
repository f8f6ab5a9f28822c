import { getMovieIcon } from "./movie-icons";
import type { MovieService } from "./movie-service";
import { parseMovieId, parseSearchQuery } from "./query";
import { averageRating, type ReviewService } from "./reviews";
import { hasSearchCriteria } from "./search";
import type { Movie, Review } from "./types";

export const MOVIE_NOT_FOUND_TITLE = "영화를 찾을 수 없습니다";
export const MOVIE_NOT_FOUND_MESSAGE = "요청한 ID 에 해당하는 영화가 없습니다.";

export type MovieListing = {
    movies: Movie[];
    allGenres: string[];
    searchPerformed: boolean;
    searchName: string | null;
    searchId: number | null;
    searchGenre: string | null;
    resultCount: number | null;
    errorMessage: string | null;
};

export type MovieDetails =
    | {
          kind: "found";
          movie: Movie;
          icon: string;
          reviews: Review[];
          averageRating: number | null;
      }
    | { kind: "not-found"; title: string; message: string };

/**
 * /movies 화면의 모델.
 * 0 이하의 id 는 검색 엔진과 같이 조건 없음으로 보고, 숫자가 아닌 id 는 버리고 안내 메시지를 띄운다.
 */
export function buildMovieListing(service: MovieService, params: URLSearchParams): MovieListing {
    const query = parseSearchQuery(params);
    const { criteria } = query;
    const errorMessage = !query.ok && criteria.id === null ? query.error.message : null;
    const allGenres = service.getAllGenres();

    if (!hasSearchCriteria(criteria)) {
        return {
            movies: service.getAllMovies(),
            allGenres,
            searchPerformed: false,
            searchName: null,
            searchId: null,
            searchGenre: null,
            resultCount: null,
            errorMessage,
        };
    }

    const movies = service.searchMovies(criteria);
    return {
        movies,
        allGenres,
        searchPerformed: true,
        searchName: criteria.name ?? null,
        searchId: criteria.id ?? null,
        searchGenre: criteria.genre ?? null,
        resultCount: movies.length,
        errorMessage,
    };
}

export function buildMovieDetails(
    movies: MovieService,
    reviews: ReviewService,
    rawId: string
): MovieDetails {
    const movieId = parseMovieId(rawId);
    const movie = movieId === null ? null : movies.getMovieById(movieId);
    if (!movie) {
        return {
            kind: "not-found",
            title: MOVIE_NOT_FOUND_TITLE,
            message: `ID ${rawId} 에 해당하는 영화가 없습니다.`,
        };
    }

    const movieReviews = reviews.getReviewsForMovie(movie.id);
    return {
        kind: "found",
        movie,
        icon: getMovieIcon(movie.movieName),
        reviews: movieReviews,
        averageRating: averageRating(movieReviews),
    };
}
