import type { Movie } from "@/lib/types";

type MovieCardProps = {
    movie: Movie;
    icon: string;
};

export default function MovieCard({ movie, icon }: MovieCardProps) {
    return (
        <article
            style={{
                border: "1px solid #ddd",
                borderRadius: 8,
                padding: 16,
                display: "flex",
                flexDirection: "column",
                gap: 6,
            }}
        >
            <div style={{ fontSize: 32 }} aria-hidden="true">
                {icon}
            </div>
            <h2 style={{ margin: 0, fontSize: 18 }}>
                <a href={`/movies/${movie.id}/details`}>{movie.movieName}</a>
            </h2>
            <p style={{ margin: 0, color: "#555" }}>{`${movie.director} · ${movie.year}`}</p>
            <p style={{ margin: 0 }}>{movie.genre}</p>
            <p style={{ margin: 0 }}>{`⭐ ${movie.imdbRating.toFixed(1)} · ${movie.duration}분`}</p>
        </article>
    );
}
