import type { Review } from "@/lib/types";

type ReviewListProps = {
    reviews: Review[];
    averageRating: number | null;
};

export default function ReviewList({ reviews, averageRating }: ReviewListProps) {
    if (!reviews.length) {
        return <p>아직 등록된 리뷰가 없습니다.</p>;
    }

    return (
        <section>
            <h2 style={{ fontSize: 18 }}>{`리뷰 ${reviews.length}개 · 평균 ⭐ ${averageRating ?? "-"}`}</h2>
            <ul style={{ listStyle: "none", padding: 0, display: "grid", gap: 12 }}>
                {reviews.map((review, index) => (
                    <li key={`${review.userName}-${index}`}>
                        <strong>{`${review.avatarName} ${review.userName}`}</strong>
                        <span>{` · ⭐ ${review.rating.toFixed(1)}`}</span>
                        <p style={{ margin: "4px 0 0" }}>{review.comment}</p>
                    </li>
                ))}
            </ul>
        </section>
    );
}
