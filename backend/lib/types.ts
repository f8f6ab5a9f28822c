export type Movie = {
    id: number;
    movieName: string;
    director: string;
    year: number;
    // "Crime/Drama" 처럼 슬래시로 묶인 복합 장르일 수 있음
    genre: string;
    description: string;
    duration: number;
    imdbRating: number;
};

export type Review = {
    movieId: number;
    userName: string;
    avatarName: string;
    rating: number;
    comment: string;
};

export type SearchCriteria = {
    name?: string | null;
    id?: number | null;
    genre?: string | null;
};
