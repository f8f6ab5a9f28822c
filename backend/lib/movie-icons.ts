const DEFAULT_ICON = "🎬";

// 먼저 매칭되는 키워드가 우선
const ICON_KEYWORDS: ReadonlyArray<readonly [keyword: string, icon: string]> = [
    ["prison", "🔒"],
    ["family", "👨‍👩‍👦"],
    ["hero", "🦸"],
    ["masked", "🎭"],
    ["dream", "💭"],
    ["virtual", "💻"],
    ["space", "🚀"],
    ["kingdom", "🏯"],
    ["harbor", "⚓"],
    ["laugh", "😂"],
    ["street", "🏙️"],
    ["stories", "📚"],
    ["journey", "🧭"],
];

export function getMovieIcon(movieName?: string | null): string {
    const normalized = movieName?.trim().toLowerCase();
    if (!normalized) return DEFAULT_ICON;
    const match = ICON_KEYWORDS.find(([keyword]) => normalized.includes(keyword));
    return match ? match[1] : DEFAULT_ICON;
}
