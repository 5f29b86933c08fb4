/**
 * Tests for the from(TemporalAccessor) evaluator
 *
 * Types are plain strings here; the resolver treats "accessor" as the
 * accessor capability and any temporal tag name as that type.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type CandidateCall,
  type TypeResolver,
  evaluateFromCall,
} from "./evaluate.js";
import { createCompatibilityTable } from "./compatibility.js";
import { isTemporalTypeTag } from "./tags.js";

const resolver: TypeResolver<string> = {
  isSameType: (left, right) => left === right,
  isTemporalAccessor: (type) => type === "accessor",
  tagOf: (type) => (isTemporalTypeTag(type) ? type : undefined),
};

const createCall = (
  overrides: Partial<CandidateCall<string>> & {
    readonly receiver?: string;
    readonly argument?: string;
  }
): CandidateCall<string> => ({
  isFromAccessorShape: () => true,
  isInTrustedScope: () => false,
  receiverType: () => overrides.receiver,
  argumentType: () => overrides.argument,
  resultType: () => overrides.receiver,
  argumentText: () => "value",
  ...overrides,
});

describe("evaluateFromCall", () => {
  it("should report an invalid conversion", () => {
    expect(
      evaluateFromCall(
        createCall({ receiver: "LocalDate", argument: "Month" }),
        resolver
      )
    ).to.deep.equal({
      kind: "always-invalid",
      target: "LocalDate",
      source: "Month",
    });
  });

  it("should accept a compatible conversion", () => {
    expect(
      evaluateFromCall(
        createCall({ receiver: "Month", argument: "LocalDate" }),
        resolver
      )
    ).to.deep.equal({ kind: "no-finding", reason: "compatible" });
  });

  it("should report a same-type call as redundant", () => {
    expect(
      evaluateFromCall(
        createCall({
          receiver: "Instant",
          argument: "Instant",
          argumentText: () => "instant",
        }),
        resolver
      )
    ).to.deep.equal({ kind: "always-redundant", replacement: "instant" });
  });

  it("should compare the result type, not the receiver, for redundancy", () => {
    const verdict = evaluateFromCall(
      createCall({
        receiver: "LocalDate",
        argument: "LocalDate",
        resultType: () => "accessor",
      }),
      resolver
    );
    expect(verdict).to.deep.equal({ kind: "no-finding", reason: "compatible" });
  });

  it("should stop at a shape mismatch", () => {
    let queried = false;
    const verdict = evaluateFromCall(
      createCall({
        isFromAccessorShape: () => false,
        receiverType: () => {
          queried = true;
          return "LocalDate";
        },
      }),
      resolver
    );
    expect(verdict).to.deep.equal({
      kind: "no-finding",
      reason: "shape-mismatch",
    });
    expect(queried).to.equal(false);
  });

  it("should not report calls in a trusted scope", () => {
    expect(
      evaluateFromCall(
        createCall({
          receiver: "LocalDate",
          argument: "Month",
          isInTrustedScope: () => true,
        }),
        resolver
      )
    ).to.deep.equal({ kind: "no-finding", reason: "trusted-scope" });
  });

  it("should not report a receiver outside the temporal types", () => {
    expect(
      evaluateFromCall(
        createCall({ receiver: "Widget", argument: "Month" }),
        resolver
      )
    ).to.deep.equal({ kind: "no-finding", reason: "unknown-receiver" });
    expect(
      evaluateFromCall(createCall({ argument: "Month" }), resolver)
    ).to.deep.equal({ kind: "no-finding", reason: "unknown-receiver" });
  });

  it("should not report an unresolved argument", () => {
    expect(
      evaluateFromCall(createCall({ receiver: "LocalDate" }), resolver)
    ).to.deep.equal({ kind: "no-finding", reason: "unresolved-argument" });
  });

  it("should not report an argument typed as the accessor", () => {
    expect(
      evaluateFromCall(
        createCall({ receiver: "LocalDate", argument: "accessor" }),
        resolver
      )
    ).to.deep.equal({ kind: "no-finding", reason: "unnarrowed-argument" });
  });

  it("should not report an argument outside the temporal types", () => {
    expect(
      evaluateFromCall(
        createCall({ receiver: "LocalDate", argument: "Widget" }),
        resolver
      )
    ).to.deep.equal({ kind: "no-finding", reason: "unknown-argument" });
  });

  it("should use the table it is given", () => {
    const table = createCompatibilityTable({ LocalDate: ["Month"] });
    const call = createCall({ receiver: "Month", argument: "LocalDate" });

    expect(evaluateFromCall(call, resolver, table)).to.deep.equal({
      kind: "always-invalid",
      target: "Month",
      source: "LocalDate",
    });
    expect(evaluateFromCall(call, resolver)).to.deep.equal({
      kind: "no-finding",
      reason: "compatible",
    });
  });

  it("should return the same verdict when evaluated twice", () => {
    const call = createCall({ receiver: "Year", argument: "DayOfWeek" });
    expect(evaluateFromCall(call, resolver)).to.deep.equal(
      evaluateFromCall(call, resolver)
    );
  });
});
