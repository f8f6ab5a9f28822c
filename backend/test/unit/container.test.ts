import { expect } from "chai";
import * as path from "path";
import * as sinon from "sinon";

import { getMovieService, getServices } from "../../lib/container";
import { CatalogLoadError } from "../../lib/errors";
import { FIXTURES_DIR, MOVIES_FILE, REVIEWS_FILE } from "../tools/fixtures";

describe("getServices", function () {
    const originalEnv = { ...process.env };

    beforeEach(function () {
        sinon.stub(console, "info");
    });

    afterEach(function () {
        sinon.restore();
        process.env = { ...originalEnv };
    });

    it("retries after a failed load", async function () {
        process.env.MOVIES_DATA_FILE = path.join(FIXTURES_DIR, "malformed-movies.json");
        process.env.REVIEWS_DATA_FILE = REVIEWS_FILE;

        const error = await getServices().catch((e: unknown) => e);
        expect(error).to.be.instanceOf(CatalogLoadError);

        process.env.MOVIES_DATA_FILE = MOVIES_FILE;
        const services = await getServices();
        expect(services.movies.getAllMovies()).to.have.lengthOf(12);
    });

    it("builds the services once per process", async function () {
        process.env.MOVIES_DATA_FILE = MOVIES_FILE;
        process.env.REVIEWS_DATA_FILE = REVIEWS_FILE;

        const first = getServices();
        expect(getServices()).to.equal(first);
        expect(await getMovieService()).to.equal((await first).movies);
        expect((await first).reviews.getReviewsForMovie(2)).to.have.lengthOf(1);
    });
});
