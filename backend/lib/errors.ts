export class CatalogLoadError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "CatalogLoadError";
    }
}

export function errorMessage(error: unknown, fallback: string): string {
    return error instanceof Error ? error.message : fallback;
}
