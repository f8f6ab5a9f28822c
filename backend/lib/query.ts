import type { SearchCriteria } from "./types";

export type InvalidParameter = {
    parameter: "id";
    message: string;
};

export type ParsedSearchQuery =
    | { ok: true; criteria: SearchCriteria }
    | { ok: false; error: InvalidParameter; criteria: SearchCriteria };

type IdParseResult =
    | { ok: true; value: number | null }
    | { ok: false; value: number | null; message: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseInteger(raw: string): number | null {
    const trimmed = raw.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return null;
    const value = Number(trimmed);
    if (Number.isSafeInteger(value)) return value;
    // 안전 범위를 넘는 양수는 카탈로그의 어떤 id 와도 일치하지 않는다
    return trimmed.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

function parseIdParam(raw: string | null): IdParseResult {
    if (raw === null || raw.trim() === "") {
        return { ok: true, value: null };
    }
    const value = parseInteger(raw);
    if (value === null) {
        return { ok: false, value: null, message: "id 는 정수여야 합니다." };
    }
    if (value <= 0) {
        return { ok: false, value, message: "id 는 양의 정수여야 합니다." };
    }
    return { ok: true, value };
}

export function parseSearchQuery(params: URLSearchParams): ParsedSearchQuery {
    const id = parseIdParam(params.get("id"));
    const criteria: SearchCriteria = {
        name: params.get("name"),
        id: id.value,
        genre: params.get("genre"),
    };
    if (!id.ok) {
        return { ok: false, error: { parameter: "id", message: id.message }, criteria };
    }
    return { ok: true, criteria };
}

export function parseMovieId(raw: string): number | null {
    const value = parseInteger(raw);
    return value !== null && value > 0 ? value : null;
}
