export type PageSearchParams = Record<string, string | string[] | undefined>;

// 같은 키가 여러 번 오면 첫 번째 값만 사용 (URLSearchParams.get 과 동일)
export function toSearchParams(raw: PageSearchParams): URLSearchParams {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(raw)) {
        const first = Array.isArray(value) ? value[0] : value;
        if (first !== undefined) {
            params.set(key, first);
        }
    }
    return params;
}
