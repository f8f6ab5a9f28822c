import { getMovieIcon } from "@/lib/movie-icons";
import type { Movie } from "@/lib/types";
import MovieCard from "./MovieCard";

export default function MovieList({ movies }: { movies: Movie[] }) {
    if (!movies.length) {
        return <p>조건에 맞는 영화가 없습니다.</p>;
    }

    return (
        <section
            style={{
                display: "grid",
                gridTemplateColumns: "repeat(auto-fill, minmax(220px, 1fr))",
                gap: 16,
            }}
        >
            {movies.map((movie) => (
                <MovieCard key={movie.id} movie={movie} icon={getMovieIcon(movie.movieName)} />
            ))}
        </section>
    );
}
