import path from "path";

export type CatalogConfig = {
    moviesDataFile: string;
    reviewsDataFile: string;
};

const DEFAULT_MOVIES_DATA_FILE = "data/movies.json";
const DEFAULT_REVIEWS_DATA_FILE = "data/reviews.json";

function resolveDataFile(value: string | undefined, fallback: string, cwd: string): string {
    const chosen = value?.trim() || fallback;
    return path.resolve(cwd, chosen);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): CatalogConfig {
    const { MOVIES_DATA_FILE, REVIEWS_DATA_FILE } = env;
    return {
        moviesDataFile: resolveDataFile(MOVIES_DATA_FILE, DEFAULT_MOVIES_DATA_FILE, cwd),
        reviewsDataFile: resolveDataFile(REVIEWS_DATA_FILE, DEFAULT_REVIEWS_DATA_FILE, cwd),
    };
}
