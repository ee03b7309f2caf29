import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OmdbAdapter, parseOmdbDetail, parseOmdbSearch } from "./omdb";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const config = {
  apiKey: "test-key",
  baseUrl: "http://omdb.example.test/",
  searchTimeoutMs: 3000,
  detailTimeoutMs: 5000,
};

function respondWith(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_input: URL | RequestInfo, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestedUrl(fetchMock: ReturnType<typeof respondWith>): URL {
  return new URL(String(fetchMock.mock.calls[0][0]));
}

const DETAIL_PAYLOAD = {
  Title: "The Avengers",
  Year: "2012",
  Rated: "PG-13",
  Released: "04 May 2012",
  Runtime: "143 min",
  Genre: "Action, Sci-Fi",
  Director: "Joss Whedon",
  Writer: "Joss Whedon, Zak Penn",
  Actors: "Robert Downey Jr., Chris Evans",
  Plot: "Earth's mightiest heroes must come together.",
  Language: "English, Russian",
  Awards: "Nominated for 1 Oscar",
  Poster: "https://img.example.test/avengers.jpg",
  Ratings: [
    { Source: "Internet Movie Database", Value: "8.0/10" },
    { Source: "Rotten Tomatoes", Value: "91%" },
    { Source: "Metacritic", Value: "69/100" },
  ],
  imdbRating: "8.0",
  imdbID: "tt0848228",
  BoxOffice: "$623,357,910",
  Response: "True",
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseOmdbSearch", () => {
  it("maps search items to candidates", () => {
    const outcome = parseOmdbSearch({
      Response: "True",
      totalResults: "23",
      Search: [
        { Title: "The Avengers", Year: "2012", imdbID: "tt0848228", Type: "movie", Poster: "N/A" },
        { Title: "Untracked", Year: "N/A" },
        { Year: "1999" },
        "garbage",
      ],
    });
    expect(outcome).toEqual({
      kind: "results",
      totalResults: 23,
      candidates: [
        { identifier: "tt0848228", title: "The Avengers", year: "2012" },
        { identifier: "Untracked", title: "Untracked" },
      ],
    });
  });

  it("falls back to the page length when totalResults is missing", () => {
    const outcome = parseOmdbSearch({ Response: "True", Search: [{ Title: "Heat", imdbID: "tt0113277" }] });
    expect(outcome).toEqual({
      kind: "results",
      totalResults: 1,
      candidates: [{ identifier: "tt0113277", title: "Heat" }],
    });
  });

  it("treats Response False as empty", () => {
    expect(parseOmdbSearch({ Response: "False", Error: "Movie not found!" })).toEqual({
      kind: "empty",
      reason: "Movie not found!",
    });
  });

  it("rejects malformed payloads", () => {
    expect(parseOmdbSearch([])).toEqual({ kind: "error", reason: "malformed payload" });
    expect(parseOmdbSearch({ Response: "True" })).toEqual({ kind: "error", reason: "malformed payload" });
  });
});

describe("parseOmdbDetail", () => {
  it("maps a full payload", () => {
    const outcome = parseOmdbDetail(DETAIL_PAYLOAD);
    expect(outcome).toEqual({
      kind: "results",
      detail: {
        identifier: "tt0848228",
        title: "The Avengers",
        year: "2012",
        poster: "https://img.example.test/avengers.jpg",
        runtime: "143 min",
        genres: ["Action", "Sci-Fi"],
        plot: "Earth's mightiest heroes must come together.",
        director: "Joss Whedon",
        writer: "Joss Whedon, Zak Penn",
        cast: "Robert Downey Jr., Chris Evans",
        rawRatings: {
          "Internet Movie Database": "8.0/10",
          "Rotten Tomatoes": "91%",
          Metacritic: "69/100",
        },
        boxOfficeRaw: "$623,357,910",
        releaseDate: "04 May 2012",
        language: "English, Russian",
        awards: "Nominated for 1 Oscar",
        imdbRating: "8.0",
      },
    });
  });

  it("fills missing fields with N/A and an empty genre list", () => {
    const outcome = parseOmdbDetail({ Response: "True", Title: "Sparse", Genre: "N/A" });
    expect(outcome.kind).toBe("results");
    if (outcome.kind !== "results") return;
    expect(outcome.detail.identifier).toBe("Sparse");
    expect(outcome.detail.genres).toEqual([]);
    expect(outcome.detail.boxOfficeRaw).toBe("N/A");
    expect(outcome.detail.rawRatings).toEqual({});
  });

  it("rejects details without title or id", () => {
    expect(parseOmdbDetail({ Response: "True" })).toEqual({ kind: "error", reason: "detail without identifier" });
  });

  it("treats Response False as empty", () => {
    expect(parseOmdbDetail({ Response: "False", Error: "Incorrect IMDb ID." })).toEqual({
      kind: "empty",
      reason: "Incorrect IMDb ID.",
    });
  });
});

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

describe("OmdbAdapter", () => {
  let adapter: OmdbAdapter;

  beforeEach(() => {
    adapter = new OmdbAdapter({ config });
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("sends search term, page and filters", async () => {
    const fetchMock = respondWith({ Response: "True", totalResults: "1", Search: [{ Title: "Heat", imdbID: "tt0113277" }] });

    const page = await adapter.searchByTerm("Heat", 2, { type: "movie", year: "1995" });

    expect(page).toEqual({ candidates: [{ identifier: "tt0113277", title: "Heat" }], totalResults: 1 });
    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get("apikey")).toBe("test-key");
    expect(url.searchParams.get("s")).toBe("Heat");
    expect(url.searchParams.get("page")).toBe("2");
    expect(url.searchParams.get("type")).toBe("movie");
    expect(url.searchParams.get("y")).toBe("1995");
  });

  it("returns an empty page on HTTP failure", async () => {
    respondWith({}, 500);
    expect(await adapter.searchByTerm("Heat", 1)).toEqual({ candidates: [], totalResults: 0 });
  });

  it("returns an empty page when nothing matches", async () => {
    respondWith({ Response: "False", Error: "Movie not found!" });
    expect(await adapter.searchByTerm("zzzz", 1)).toEqual({ candidates: [], totalResults: 0 });
  });

  it("looks up tt ids by id", async () => {
    const fetchMock = respondWith(DETAIL_PAYLOAD);
    const detail = await adapter.getDetails("tt0848228");

    expect(detail?.title).toBe("The Avengers");
    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get("i")).toBe("tt0848228");
    expect(url.searchParams.get("t")).toBeNull();
    expect(url.searchParams.get("plot")).toBe("short");
  });

  it("looks up anything else by title", async () => {
    const fetchMock = respondWith(DETAIL_PAYLOAD);
    await adapter.getDetails("The Avengers");

    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get("t")).toBe("The Avengers");
    expect(url.searchParams.get("i")).toBeNull();
  });

  it("returns null when the title is unknown or the call fails", async () => {
    respondWith({ Response: "False", Error: "Movie not found!" });
    expect(await adapter.getDetails("tt9999999")).toBeNull();

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      })
    );
    expect(await adapter.getDetails("tt9999999")).toBeNull();
  });
});
