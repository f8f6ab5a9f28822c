import { corsEmpty } from "@/lib/cors";
import { getMovieService } from "@/lib/container";
import { handleMovieSearch } from "@/lib/handlers";

export const dynamic = "force-dynamic";

export function GET(request: Request) {
    return handleMovieSearch(getMovieService, request);
}

export function OPTIONS() {
    return corsEmpty();
}
