import { CatalogLoadError } from "./errors";
import {
    isRecord,
    readJsonFile,
    requireArray,
    requireInteger,
    requirePositiveInteger,
    requireRating,
    requireString,
} from "./records";
import type { Movie } from "./types";

export type MovieCatalog = readonly Movie[];

function parseMovie(raw: unknown, index: number): Movie {
    const at = `movies[${index}]`;
    if (!isRecord(raw)) {
        throw new CatalogLoadError(`${at} 항목은 객체여야 합니다.`);
    }
    const movieName = requireString(raw, "movieName", at);
    if (!movieName.trim()) {
        throw new CatalogLoadError(`${at}.movieName 값이 비어 있습니다.`);
    }
    return Object.freeze({
        id: requirePositiveInteger(raw, "id", at),
        movieName,
        director: requireString(raw, "director", at),
        year: requireInteger(raw, "year", at),
        genre: requireString(raw, "genre", at),
        description: requireString(raw, "description", at),
        duration: requireInteger(raw, "duration", at),
        imdbRating: requireRating(raw, "imdbRating", at),
    });
}

/**
 * JSON 문서를 검증해 불변 카탈로그로 만든다.
 * 순서는 파일 순서 그대로 유지되고, id 가 중복되면 실패한다.
 */
export function parseMovies(raw: unknown): MovieCatalog {
    const entries = requireArray(raw, "movies");
    const seen = new Set<number>();
    const movies = entries.map((entry, index) => {
        const movie = parseMovie(entry, index);
        if (seen.has(movie.id)) {
            throw new CatalogLoadError(`movies[${index}].id 값 ${movie.id} 이(가) 중복되었습니다.`);
        }
        seen.add(movie.id);
        return movie;
    });
    return Object.freeze(movies);
}

export async function loadCatalog(filePath: string): Promise<MovieCatalog> {
    return parseMovies(await readJsonFile(filePath));
}
