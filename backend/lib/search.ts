import type { Movie, SearchCriteria } from "./types";

type MoviePredicate = (movie: Movie) => boolean;

function normalizeTerm(value?: string | null): string | null {
    const trimmed = value?.trim().toLowerCase();
    return trimmed ? trimmed : null;
}

function activeId(id?: number | null): number | null {
    return typeof id === "number" && id > 0 ? id : null;
}

// 0 이하의 id 는 "조건 없음"으로 취급한다. 거절은 요청 경계(handlers)의 몫.
function buildPredicates({ name, id, genre }: SearchCriteria): MoviePredicate[] {
    const predicates: MoviePredicate[] = [];

    const idTerm = activeId(id);
    if (idTerm !== null) {
        predicates.push((movie) => movie.id === idTerm);
    }

    const nameTerm = normalizeTerm(name);
    if (nameTerm !== null) {
        predicates.push((movie) => movie.movieName.toLowerCase().includes(nameTerm));
    }

    const genreTerm = normalizeTerm(genre);
    if (genreTerm !== null) {
        predicates.push((movie) => movie.genre.toLowerCase().includes(genreTerm));
    }

    return predicates;
}

export function hasSearchCriteria(criteria: SearchCriteria): boolean {
    return buildPredicates(criteria).length > 0;
}

/**
 * 이름/장르는 대소문자 무시 부분 일치, id 는 정확히 일치.
 * 조건은 모두 AND 로 결합되고 결과는 항상 카탈로그 순서를 따른다.
 * 조건이 하나도 없으면 전체 목록의 사본을 돌려준다.
 */
export function searchMovies(catalog: readonly Movie[], criteria: SearchCriteria = {}): Movie[] {
    return buildPredicates(criteria).reduce<Movie[]>(
        (candidates, predicate) => candidates.filter(predicate),
        [...catalog]
    );
}

export function allGenres(catalog: readonly Movie[]): string[] {
    return Array.from(new Set(catalog.map((movie) => movie.genre))).sort();
}
