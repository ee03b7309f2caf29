import { describe, it, expect } from "vitest";
import { BOX_OFFICE_SEED_TERMS, DEFAULT_BOX_OFFICE_IDS, curatedIdsFor } from "./curated";

describe("curated lists", () => {
  it("looks up curated ids case-insensitively", () => {
    expect(curatedIdsFor(" Sci-Fi ")[0]).toBe("tt0816692");
    expect(curatedIdsFor("action")).toHaveLength(10);
  });

  it("has no curated ids for unknown or missing genres", () => {
    expect(curatedIdsFor("Documentary")).toEqual([]);
    expect(curatedIdsFor(undefined)).toEqual([]);
  });

  it("ships the default box-office seeds", () => {
    expect(DEFAULT_BOX_OFFICE_IDS[0]).toBe("tt0499549");
    expect(BOX_OFFICE_SEED_TERMS).toContain("James Bond");
  });
});
