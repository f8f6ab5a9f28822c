import { expect } from "chai";

import { getMovieIcon } from "../../lib/movie-icons";

describe("getMovieIcon", function () {
    it("picks the icon of the first matching keyword", function () {
        expect(getMovieIcon("The Prison Escape")).to.equal("🔒");
        expect(getMovieIcon("The Masked Hero")).to.equal("🦸");
        expect(getMovieIcon("DREAM HEIST")).to.equal("💭");
    });

    it("falls back to the clapperboard", function () {
        expect(getMovieIcon("Untitled Project")).to.equal("🎬");
        expect(getMovieIcon("  ")).to.equal("🎬");
        expect(getMovieIcon(null)).to.equal("🎬");
    });
});
