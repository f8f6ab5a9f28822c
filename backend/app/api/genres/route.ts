import { corsEmpty } from "@/lib/cors";
import { getMovieService } from "@/lib/container";
import { handleGenreList } from "@/lib/handlers";

export function GET() {
    return handleGenreList(getMovieService);
}

export function OPTIONS() {
    return corsEmpty();
}
