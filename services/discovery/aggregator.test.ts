import { describe, it, expect, vi } from "vitest";
import {
  aggregateCandidates,
  candidateKey,
  excludeTitlesContaining,
  seedCandidates,
} from "./aggregator";
import { makeCandidate } from "./fixtures";
import type { Candidate, MetadataProvider, SearchPage } from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Provider whose search pages are looked up by `${term}:${page}`. */
function makeProvider(pages: Record<string, SearchPage>) {
  const searchByTerm = vi.fn(async (term: string, page: number): Promise<SearchPage> => {
    return pages[`${term}:${page}`] ?? { candidates: [], totalResults: 0 };
  });
  const provider: MetadataProvider = {
    searchByTerm,
    getDetails: vi.fn(async () => null),
  };
  return { provider, searchByTerm };
}

function range(prefix: string, from: number, to: number): Candidate[] {
  const out: Candidate[] = [];
  for (let i = from; i <= to; i++) out.push(makeCandidate(`${prefix}${i}`, `Title ${prefix}${i}`));
  return out;
}

function ids(candidates: Candidate[]): string[] {
  return candidates.map((c) => c.identifier);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("aggregateCandidates", () => {
  it("keeps first-seen order and each id once", async () => {
    const { provider } = makeProvider({
      "Avenger:1": {
        candidates: [makeCandidate("tt1", "A"), makeCandidate("tt2", "B"), makeCandidate("TT1", "A again")],
        totalResults: 3,
      },
      "Avengers:1": {
        candidates: [makeCandidate("tt2", "B"), makeCandidate("tt3", "C")],
        totalResults: 2,
      },
    });

    const pool = await aggregateCandidates(provider, {
      terms: ["Avenger", "Avengers"],
      targetSize: 100,
      maxPagesPerTerm: 5,
    });

    expect(ids(pool)).toEqual(["tt1", "tt2", "tt3"]);
  });

  it("stops paging a term once its total is exhausted", async () => {
    const { provider, searchByTerm } = makeProvider({
      "Heat:1": { candidates: range("a", 1, 10), totalResults: 15 },
      "Heat:2": { candidates: range("a", 11, 15), totalResults: 15 },
    });

    const pool = await aggregateCandidates(provider, { terms: ["Heat"], targetSize: 100, maxPagesPerTerm: 5 });

    expect(pool).toHaveLength(15);
    expect(searchByTerm).toHaveBeenCalledTimes(2);
  });

  it("stops paging a term at the first empty page", async () => {
    const { provider, searchByTerm } = makeProvider({
      "Heat:1": { candidates: range("a", 1, 10), totalResults: 100 },
    });

    await aggregateCandidates(provider, { terms: ["Heat", "Heats"], targetSize: 100, maxPagesPerTerm: 5 });

    expect(searchByTerm.mock.calls.map(([term, page]) => `${term}:${page}`)).toEqual([
      "Heat:1",
      "Heat:2",
      "Heats:1",
    ]);
  });

  it("stops once the pool reaches the target size", async () => {
    const { provider, searchByTerm } = makeProvider({
      "Heat:1": { candidates: range("a", 1, 10), totalResults: 50 },
      "Heat:2": { candidates: range("a", 11, 20), totalResults: 50 },
    });

    const pool = await aggregateCandidates(provider, { terms: ["Heat", "Heats"], targetSize: 10, maxPagesPerTerm: 5 });

    expect(pool).toHaveLength(10);
    expect(searchByTerm).toHaveBeenCalledTimes(1);
  });

  it("never requests more than five pages per term", async () => {
    const pages: Record<string, SearchPage> = {};
    for (let p = 1; p <= 8; p++) pages[`Heat:${p}`] = { candidates: range(`p${p}-`, 1, 10), totalResults: 80 };
    const { provider, searchByTerm } = makeProvider(pages);

    await aggregateCandidates(provider, { terms: ["Heat"], targetSize: 1000, maxPagesPerTerm: 8 });

    expect(searchByTerm).toHaveBeenCalledTimes(5);
  });

  it("admits seeds first and skips their duplicates", async () => {
    const { provider } = makeProvider({
      "Action:1": { candidates: [makeCandidate("tt9", "Z"), makeCandidate("tt0848228", "The Avengers")], totalResults: 2 },
    });

    const pool = await aggregateCandidates(provider, {
      terms: ["Action"],
      targetSize: 100,
      maxPagesPerTerm: 5,
      seed: seedCandidates(["tt0848228", "tt4154796"]),
    });

    expect(ids(pool)).toEqual(["tt0848228", "tt4154796", "tt9"]);
    expect(pool[0].title).toBe("");
  });

  it("drops excluded titles", async () => {
    const { provider } = makeProvider({
      "Action:1": {
        candidates: [makeCandidate("tt1", "Action Jackson"), makeCandidate("tt2", "Die Hard")],
        totalResults: 2,
      },
    });

    const pool = await aggregateCandidates(provider, {
      terms: ["Action"],
      targetSize: 100,
      maxPagesPerTerm: 5,
      exclude: excludeTitlesContaining("action"),
    });

    expect(ids(pool)).toEqual(["tt2"]);
  });

  it("skips blank terms and passes filters through", async () => {
    const { provider, searchByTerm } = makeProvider({});

    const pool = await aggregateCandidates(provider, {
      terms: ["  ", "Heat"],
      targetSize: 10,
      maxPagesPerTerm: 1,
      filters: { type: "movie" },
    });

    expect(pool).toEqual([]);
    expect(searchByTerm).toHaveBeenCalledWith("Heat", 1, { type: "movie" });
  });
});

describe("candidateKey", () => {
  it("falls back to the title when there is no identifier", () => {
    expect(candidateKey({ identifier: "", title: " Heat " })).toBe("heat");
    expect(candidateKey({ identifier: "TT0113277", title: "Heat" })).toBe("tt0113277");
  });
});
