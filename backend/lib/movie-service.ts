import type { MovieCatalog } from "./catalog";
import { allGenres, searchMovies } from "./search";
import type { Movie, SearchCriteria } from "./types";

export type MovieService = {
    getAllMovies(): Movie[];
    getMovieById(id?: number | null): Movie | null;
    searchMovies(criteria: SearchCriteria): Movie[];
    getAllGenres(): string[];
};

export function createMovieService(catalog: MovieCatalog): MovieService {
    // 카탈로그는 바뀌지 않으므로 장르 목록은 한 번만 계산
    const genres = allGenres(catalog);

    return {
        getAllMovies: () => [...catalog],
        getMovieById(id) {
            if (typeof id !== "number" || !Number.isInteger(id) || id <= 0) {
                return null;
            }
            return catalog.find((movie) => movie.id === id) ?? null;
        },
        searchMovies: (criteria) => searchMovies(catalog, criteria),
        getAllGenres: () => [...genres],
    };
}
