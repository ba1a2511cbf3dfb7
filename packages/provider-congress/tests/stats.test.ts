/**
 * @fileoverview Tests for member distribution statistics.
 */

import { describe, it, expect } from "vitest";
import type { MemberRecord, MemberTerm } from "@congress-roster/contracts";
import { computeStatistics } from "../src/stats.js";

function member(id: string, terms: MemberTerm[], currentMember?: boolean): MemberRecord {
  return {
    bioguideId: id,
    name: id,
    party: "Independent",
    state: "Ohio",
    chamber: "House",
    url: "",
    currentMember,
    terms,
  };
}

describe("computeStatistics", () => {
  it("should count explicit non-current members as former in the current session", () => {
    const stats = computeStatistics(
      [member("A", [], false), member("B", [], true), member("C", [])],
      118,
      true
    );

    expect(stats).toEqual({ total: 3, former: 1, redistricted: 0 });
  });

  it("should ignore term lengths in the current session", () => {
    const short = member("A", [{ chamber: "House", congress: 118, startYear: 2023, endYear: 2024 }]);

    expect(computeStatistics([short], 118, true).former).toBe(0);
  });

  it("should count short terms as former in past sessions", () => {
    const members = [
      member("FULL", [{ chamber: "House", congress: 117, startYear: 2021, endYear: 2023 }]),
      member("SHORT", [{ chamber: "House", congress: 117, startYear: 2021, endYear: 2022 }]),
      member("OPEN", [{ chamber: "House", congress: 117, startYear: 2021 }]),
      member("OTHER", [{ chamber: "House", congress: 116, startYear: 2019, endYear: 2020 }]),
      member("NOSTART", [{ chamber: "House", congress: 117, endYear: 2 }]),
    ];

    expect(computeStatistics(members, 117, false)).toEqual({ total: 5, former: 2, redistricted: 0 });
  });

  it("should count distinct districts within the session only", () => {
    const members = [
      member("MOVED", [
        { chamber: "House", congress: 117, district: "1" },
        { chamber: "House", congress: 117, district: "2" },
      ]),
      member("STAYED", [
        { chamber: "House", congress: 117, district: "4" },
        { chamber: "House", congress: 117, district: "4" },
      ]),
      member("EARLIER", [
        { chamber: "House", congress: 116, district: "1" },
        { chamber: "House", congress: 117, district: "3" },
      ]),
      member("SENATOR", [
        { chamber: "Senate", congress: 117 },
        { chamber: "Senate", congress: 117 },
      ]),
    ];

    expect(computeStatistics(members, 117, true).redistricted).toBe(1);
  });

  it("should handle an empty list", () => {
    expect(computeStatistics([], 118, true)).toEqual({ total: 0, former: 0, redistricted: 0 });
  });
});
