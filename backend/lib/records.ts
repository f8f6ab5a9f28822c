import { readFile } from "fs/promises";
import { CatalogLoadError } from "./errors";

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requireString(entry: RawRecord, field: string, at: string): string {
    const value = entry[field];
    if (typeof value !== "string") {
        throw new CatalogLoadError(`${at}.${field} 값은 문자열이어야 합니다.`);
    }
    return value;
}

export function requireInteger(entry: RawRecord, field: string, at: string): number {
    const value = entry[field];
    if (typeof value !== "number" || !Number.isSafeInteger(value)) {
        throw new CatalogLoadError(`${at}.${field} 값은 정수여야 합니다.`);
    }
    return value;
}

export function requirePositiveInteger(entry: RawRecord, field: string, at: string): number {
    const value = requireInteger(entry, field, at);
    if (value <= 0) {
        throw new CatalogLoadError(`${at}.${field} 값은 양의 정수여야 합니다.`);
    }
    return value;
}

// 평점은 1.0 ~ 5.0 범위
export function requireRating(entry: RawRecord, field: string, at: string): number {
    const value = entry[field];
    if (typeof value !== "number" || !Number.isFinite(value) || value < 1 || value > 5) {
        throw new CatalogLoadError(`${at}.${field} 값은 1.0 ~ 5.0 사이의 숫자여야 합니다.`);
    }
    return value;
}

export function requireArray(raw: unknown, label: string): unknown[] {
    if (!Array.isArray(raw)) {
        throw new CatalogLoadError(`${label} 데이터는 배열이어야 합니다.`);
    }
    return raw;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(filePath, "utf8");
    } catch (error) {
        throw new CatalogLoadError(`데이터 파일을 읽지 못했습니다: ${filePath}`, { cause: error });
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new CatalogLoadError(`데이터 파일의 JSON 형식이 올바르지 않습니다: ${filePath}`, {
            cause: error,
        });
    }
}
