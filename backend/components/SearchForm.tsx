import type { CSSProperties } from "react";

type SearchFormProps = {
    genres: string[];
    name?: string | null;
    id?: number | null;
    genre?: string | null;
};

const fieldStyle: CSSProperties = {
    display: "flex",
    flexDirection: "column",
    gap: 4,
    fontSize: 14,
};

export default function SearchForm({ genres, name, id, genre }: SearchFormProps) {
    return (
        <form
            method="get"
            action="/movies"
            style={{ display: "flex", flexWrap: "wrap", gap: 12, alignItems: "flex-end" }}
        >
            <label style={fieldStyle}>
                제목
                <input type="text" name="name" defaultValue={name ?? ""} placeholder="예: the" />
            </label>
            <label style={fieldStyle}>
                ID
                <input type="number" name="id" min={1} defaultValue={id ?? ""} />
            </label>
            <label style={fieldStyle}>
                장르
                <input
                    type="text"
                    name="genre"
                    list="genre-options"
                    defaultValue={genre ?? ""}
                    placeholder="예: drama"
                />
            </label>
            {/* 장르 자동완성 */}
            <datalist id="genre-options">
                {genres.map((g) => (
                    <option key={g} value={g} />
                ))}
            </datalist>
            <button type="submit">검색</button>
            <a href="/movies">초기화</a>
        </form>
    );
}
