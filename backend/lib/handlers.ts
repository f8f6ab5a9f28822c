import { corsJson } from "./cors";
import { errorMessage } from "./errors";
import type { MovieService } from "./movie-service";
import { parseMovieId, parseSearchQuery } from "./query";

export type MovieServiceSource = () => Promise<MovieService>;

/**
 * GET /movies/search
 *
 * id 가 주어졌는데 0 이하이거나 정수가 아니면 검색을 호출하지 않고 400 을 돌려준다.
 * 일치하는 영화가 없으면 빈 배열과 200.
 */
export async function handleMovieSearch(getService: MovieServiceSource, request: Request) {
    const url = new URL(request.url);
    const query = parseSearchQuery(url.searchParams);
    const { name, genre } = query.criteria;
    const rawId = url.searchParams.get("id");
    console.info(
        `[movies/search] request - name: ${name ?? "-"}, id: ${rawId ?? "-"}, genre: ${genre ?? "-"}`
    );

    if (!query.ok) {
        console.warn(`[movies/search] invalid ${query.error.parameter}: ${rawId}`);
        return corsJson(
            { ok: false, parameter: query.error.parameter, message: query.error.message },
            { status: 400 }
        );
    }

    try {
        const service = await getService();
        const results = service.searchMovies(query.criteria);
        console.info(`[movies/search] returned ${results.length} results`);
        return corsJson(results);
    } catch (error) {
        console.error("[movies/search] error", error);
        return corsJson(
            { ok: false, message: errorMessage(error, "영화 검색에 실패했습니다.") },
            { status: 500 }
        );
    }
}

// GET /api/movies/{id}
export async function handleMovieLookup(getService: MovieServiceSource, rawId: string) {
    const movieId = parseMovieId(rawId);
    if (movieId === null) {
        return corsJson(
            { ok: false, parameter: "id", message: "id 는 양의 정수여야 합니다." },
            { status: 400 }
        );
    }

    try {
        const movie = (await getService()).getMovieById(movieId);
        if (!movie) {
            console.warn(`[movies/lookup] movie ${rawId} not found`);
            return corsJson(
                { ok: false, message: `ID ${rawId.trim()} 에 해당하는 영화를 찾을 수 없습니다.` },
                { status: 404 }
            );
        }
        return corsJson(movie);
    } catch (error) {
        console.error("[movies/lookup] error", error);
        return corsJson(
            { ok: false, message: errorMessage(error, "영화 정보를 불러오지 못했습니다.") },
            { status: 500 }
        );
    }
}

export async function handleGenreList(getService: MovieServiceSource) {
    try {
        const genres = (await getService()).getAllGenres();
        return corsJson({ ok: true, genres });
    } catch (error) {
        console.error("[genres] error", error);
        return corsJson(
            { ok: false, message: errorMessage(error, "장르 목록을 불러오지 못했습니다.") },
            { status: 500 }
        );
    }
}

export async function handleHealth(getService: MovieServiceSource, now: () => Date = () => new Date()) {
    try {
        const service = await getService();
        return corsJson({
            ok: true,
            movieCount: service.getAllMovies().length,
            genreCount: service.getAllGenres().length,
            time: now().toISOString(),
        });
    } catch (error) {
        console.error("[health] catalog error", error);
        return corsJson(
            { ok: false, error: errorMessage(error, "Catalog health check failed") },
            { status: 500 }
        );
    }
}
