import { corsEmpty } from "@/lib/cors";
import { getMovieService } from "@/lib/container";
import { handleHealth } from "@/lib/handlers";

export const dynamic = "force-dynamic";

export function GET() {
    return handleHealth(getMovieService);
}

export function OPTIONS() {
    return corsEmpty();
}
