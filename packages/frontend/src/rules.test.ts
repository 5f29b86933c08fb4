/**
 * Tests for the rule registry
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  FROM_TEMPORAL_ACCESSOR_RULE,
  RULES,
  explainRule,
  findRule,
} from "./rules.js";

describe("Rules", () => {
  describe("findRule", () => {
    it("should find a rule by id, name or code", () => {
      expect(findRule("from-temporal-accessor")).to.equal(
        FROM_TEMPORAL_ACCESSOR_RULE
      );
      expect(findRule("FromTemporalAccessor")).to.equal(
        FROM_TEMPORAL_ACCESSOR_RULE
      );
      expect(findRule("CHR1002")).to.equal(FROM_TEMPORAL_ACCESSOR_RULE);
    });

    it("should return undefined for unknown keys", () => {
      expect(findRule("CHR2001")).to.be.undefined;
      expect(findRule("no-such-rule")).to.be.undefined;
    });
  });

  it("should give every rule a unique id", () => {
    const ids = RULES.map((rule) => rule.id);
    expect(new Set(ids).size).to.equal(ids.length);
  });

  describe("explainRule", () => {
    it("should render the rule documentation", () => {
      const text = explainRule("CHR1001");
      const lines = text?.split("\n") ?? [];

      expect(lines.slice(0, 4)).to.deep.equal([
        "FromTemporalAccessor (from-temporal-accessor): CHR1001, CHR1002",
        "Default severity: error",
        "",
        FROM_TEMPORAL_ACCESSOR_RULE.summary,
      ]);
      expect(lines.slice(-7)).to.deep.equal([
        "Examples:",
        "  Always throws (CHR1001):",
        "    const date = LocalDate.from(Month.MARCH);",
        "  Returns its argument (CHR1002), fixed to `instant`:",
        "    const copy = Instant.from(instant);",
        "  Not reported, a Month is derivable from a LocalDate:",
        "    const month = Month.from(LocalDate.now());",
      ]);
    });

    it("should return null for unknown rules", () => {
      expect(explainRule("no-such-rule")).to.equal(null);
    });
  });
});
