/**
 * Table-driven tests covering the environment parsing helpers used for the
 * statistics CLI defaults.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readOptionalBool, readOptionalString, STATS_ENV } from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("interprets boolean flags case-insensitively", () => {
    expect(readBool("TEST_BOOL", false, { TEST_BOOL: "YES" })).to.equal(true);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "off" })).to.equal(false);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "  " })).to.equal(undefined);
  });

  it("falls back to defaults when booleans are ambiguous", () => {
    expect(readBool("TEST_BOOL", true, { TEST_BOOL: "maybe" })).to.equal(true);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "maybe" })).to.equal(undefined);
  });

  it("trims strings and treats blanks as unset", () => {
    expect(readOptionalString(STATS_ENV.logFile, { STATS_LOG_FILE: "  logs/stats.log " })).to.equal("logs/stats.log");
    expect(readOptionalString(STATS_ENV.logFile, { STATS_LOG_FILE: "   " })).to.equal(undefined);
    expect(readOptionalString(STATS_ENV.logFile, {})).to.equal(undefined);
  });

  it("reads process.env when no environment is supplied", () => {
    const previous = process.env.STATS_SORT_ENTRIES;
    process.env.STATS_SORT_ENTRIES = "1";
    try {
      expect(readBool(STATS_ENV.sortEntries, false)).to.equal(true);
    } finally {
      if (previous === undefined) {
        delete process.env.STATS_SORT_ENTRIES;
      } else {
        process.env.STATS_SORT_ENTRIES = previous;
      }
    }
  });
});
