/**
 * Call-site evaluator for `Target.from(accessor)` calls
 *
 * Host-agnostic: everything it knows about a call comes through a
 * CandidateCall and a TypeResolver. Each step below rejects cheaply, since
 * almost every call expression in a program is not a candidate.
 *
 * An accessor returning `undefined` means the host could not resolve the
 * type; that always degrades to no finding.
 */

import { COMPATIBILITY_TABLE, type CompatibilityTable } from "./compatibility.js";
import type { TemporalTypeTag } from "./tags.js";

export type TypeResolver<TType> = {
  readonly isSameType: (left: TType, right: TType) => boolean;
  /** True for the generic temporal-accessor capability type itself */
  readonly isTemporalAccessor: (type: TType) => boolean;
  readonly tagOf: (type: TType) => TemporalTypeTag | undefined;
};

export type CandidateCall<TType> = {
  /** `Static.from(x)` whose single declared parameter is the accessor type */
  readonly isFromAccessorShape: () => boolean;
  /** Inside the temporal libraries' own code */
  readonly isInTrustedScope: () => boolean;
  readonly receiverType: () => TType | undefined;
  readonly argumentType: () => TType | undefined;
  readonly resultType: () => TType | undefined;
  readonly argumentText: () => string;
};

export type NoFindingReason =
  | "shape-mismatch"
  | "trusted-scope"
  | "unknown-receiver"
  | "unresolved-argument"
  | "unnarrowed-argument"
  | "unknown-argument"
  | "compatible";

export type Verdict =
  | { readonly kind: "no-finding"; readonly reason: NoFindingReason }
  | { readonly kind: "always-redundant"; readonly replacement: string }
  | {
      readonly kind: "always-invalid";
      readonly target: TemporalTypeTag;
      readonly source: TemporalTypeTag;
    };

const noFinding = (reason: NoFindingReason): Verdict => ({
  kind: "no-finding",
  reason,
});

export const evaluateFromCall = <TType>(
  call: CandidateCall<TType>,
  resolver: TypeResolver<TType>,
  table: CompatibilityTable = COMPATIBILITY_TABLE
): Verdict => {
  if (!call.isFromAccessorShape()) {
    return noFinding("shape-mismatch");
  }

  if (call.isInTrustedScope()) {
    return noFinding("trusted-scope");
  }

  const receiverType = call.receiverType();
  const target =
    receiverType === undefined ? undefined : resolver.tagOf(receiverType);
  if (target === undefined) {
    return noFinding("unknown-receiver");
  }

  const argumentType = call.argumentType();
  if (argumentType === undefined) {
    return noFinding("unresolved-argument");
  }
  // Not narrowed: the runtime type is unknown, nothing can be proven
  if (resolver.isTemporalAccessor(argumentType)) {
    return noFinding("unnarrowed-argument");
  }

  // Same-type calls are never in the table, so this check comes first
  const resultType = call.resultType();
  if (
    resultType !== undefined &&
    resolver.isSameType(resultType, argumentType)
  ) {
    return {
      kind: "always-redundant",
      replacement: call.argumentText(),
    };
  }

  const source = resolver.tagOf(argumentType);
  if (source === undefined) {
    return noFinding("unknown-argument");
  }

  return table.isKnownIncompatible(target, source)
    ? { kind: "always-invalid", target, source }
    : noFinding("compatible");
};
