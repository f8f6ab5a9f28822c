import * as path from "path";

import type { Movie } from "../../lib/types";

export const DATA_DIR = path.join(__dirname, "../../data");
export const MOVIES_FILE = path.join(DATA_DIR, "movies.json");
export const REVIEWS_FILE = path.join(DATA_DIR, "reviews.json");
export const FIXTURES_DIR = path.join(__dirname, "../fixtures");

export function makeMovie(overrides: Partial<Movie> & Pick<Movie, "id" | "movieName">): Movie {
    return {
        director: "Test Director",
        year: 2023,
        genre: "Drama",
        description: "Test description",
        duration: 120,
        imdbRating: 4.5,
        ...overrides,
    };
}

export const SMALL_CATALOG: readonly Movie[] = [
    makeMovie({ id: 1, movieName: "Test Movie" }),
    makeMovie({ id: 2, movieName: "Action Movie", genre: "Action", imdbRating: 4.0 }),
    makeMovie({ id: 3, movieName: "The Great Film", genre: "Drama", imdbRating: 4.8 }),
    makeMovie({ id: 4, movieName: "Other Worlds", genre: "Adventure/Sci-Fi", imdbRating: 3.5 }),
];

export function ids(movies: readonly Movie[]): number[] {
    return movies.map((movie) => movie.id);
}
