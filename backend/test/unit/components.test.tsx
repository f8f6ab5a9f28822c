import { expect } from "chai";
import { renderToStaticMarkup } from "react-dom/server";

import MovieCard from "../../components/MovieCard";
import MovieList from "../../components/MovieList";
import ReviewList from "../../components/ReviewList";
import SearchForm from "../../components/SearchForm";
import MovieNotFound from "../../app/movies/[id]/details/not-found";
import { MOVIE_NOT_FOUND_MESSAGE, MOVIE_NOT_FOUND_TITLE } from "../../lib/views";
import { makeMovie } from "../tools/fixtures";

describe("components", function () {
    const movie = makeMovie({
        id: 1,
        movieName: "The Prison Escape",
        director: "John Director",
        year: 1994,
        duration: 142,
        imdbRating: 5,
    });

    describe("MovieCard", function () {
        it("links to the details page", function () {
            const html = renderToStaticMarkup(<MovieCard movie={movie} icon="🔒" />);
            expect(html).to.include('<a href="/movies/1/details">The Prison Escape</a>');
            expect(html).to.include(">John Director · 1994<");
            expect(html).to.include(">⭐ 5.0 · 142분<");
        });
    });

    describe("MovieList", function () {
        it("renders one card per movie with its icon", function () {
            const html = renderToStaticMarkup(
                <MovieList movies={[movie, makeMovie({ id: 2, movieName: "Space Voyage" })]} />
            );
            expect(html.match(/<article/g)).to.have.lengthOf(2);
            expect(html).to.include(">🔒<");
            expect(html).to.include(">🚀<");
        });

        it("renders an empty state", function () {
            expect(renderToStaticMarkup(<MovieList movies={[]} />)).to.equal(
                "<p>조건에 맞는 영화가 없습니다.</p>"
            );
        });
    });

    describe("ReviewList", function () {
        it("renders an empty state", function () {
            expect(renderToStaticMarkup(<ReviewList reviews={[]} averageRating={null} />)).to.equal(
                "<p>아직 등록된 리뷰가 없습니다.</p>"
            );
        });

        it("renders reviews with the average", function () {
            const html = renderToStaticMarkup(
                <ReviewList
                    reviews={[{ movieId: 1, userName: "Jisoo", avatarName: "🦊", rating: 5, comment: "Great." }]}
                    averageRating={5}
                />
            );
            expect(html).to.include(">리뷰 1개 · 평균 ⭐ 5<");
            expect(html).to.include("<strong>🦊 Jisoo</strong>");
            expect(html).to.include(">Great.</p>");
        });
    });

    describe("SearchForm", function () {
        it("keeps the submitted values and offers every genre", function () {
            const html = renderToStaticMarkup(
                <SearchForm genres={["Crime/Drama", "Drama"]} name="the" id={null} genre="drama" />
            );
            expect(html).to.include('action="/movies"');
            expect(html).to.include('value="the"');
            expect(html).to.include('value="drama"');
            expect(html).to.include('value="Crime/Drama"');
            expect(html).to.include('list="genre-options"');
        });
    });

    describe("MovieNotFound", function () {
        it("shows the same title the details view model reports", function () {
            const html = renderToStaticMarkup(<MovieNotFound />);
            expect(MOVIE_NOT_FOUND_TITLE).to.equal("영화를 찾을 수 없습니다");
            expect(html).to.include(`<h1>${MOVIE_NOT_FOUND_TITLE}</h1>`);
            expect(html).to.include(`<p>${MOVIE_NOT_FOUND_MESSAGE}</p>`);
        });
    });
});
