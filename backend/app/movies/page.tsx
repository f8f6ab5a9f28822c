import MovieList from "@/components/MovieList";
import SearchForm from "@/components/SearchForm";
import { getMovieService } from "@/lib/container";
import { toSearchParams, type PageSearchParams } from "@/lib/search-params";
import { buildMovieListing } from "@/lib/views";

export const dynamic = "force-dynamic";

export default async function MoviesPage({
    searchParams,
}: {
    searchParams: Promise<PageSearchParams>;
}) {
    const params = toSearchParams(await searchParams);
    const listing = buildMovieListing(await getMovieService(), params);
    console.info(
        `[movies] listing - searchPerformed: ${listing.searchPerformed}, count: ${listing.movies.length}`
    );

    return (
        <main style={{ maxWidth: 1080, margin: "0 auto", padding: 24 }}>
            <h1>영화 목록</h1>
            <SearchForm
                genres={listing.allGenres}
                name={listing.searchName}
                id={listing.searchId}
                genre={listing.searchGenre}
            />
            {listing.errorMessage && <p role="alert">{listing.errorMessage}</p>}
            {listing.searchPerformed && <p>{`검색 결과 ${listing.resultCount ?? 0}편`}</p>}
            <MovieList movies={listing.movies} />
        </main>
    );
}
