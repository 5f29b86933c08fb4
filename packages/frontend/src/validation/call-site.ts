/**
 * TypeScript host for the `from(TemporalAccessor)` evaluator
 *
 * Presents a ts.CallExpression and the type checker through the
 * CandidateCall / TypeResolver capabilities the evaluator consumes.
 */

import * as ts from "typescript";
import type { CandidateCall, TypeResolver } from "../temporal/evaluate.js";
import {
  type TemporalLibrary,
  findLibraryForModule,
  isLibraryModule,
  moduleOfNode,
} from "../temporal/libraries.js";
import { type TemporalTypeTag, isTemporalTypeTag } from "../temporal/tags.js";

const UNRESOLVED_FLAGS =
  ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.Never;

/**
 * Drop types that carry no static information (including the error type)
 */
const resolved = (type: ts.Type): ts.Type | undefined =>
  type.flags & UNRESOLVED_FLAGS ? undefined : type;

const symbolOf = (
  checker: ts.TypeChecker,
  type: ts.Type
): ts.Symbol | undefined => {
  const symbol = type.getSymbol();
  if (symbol === undefined) {
    return undefined;
  }
  return symbol.flags & ts.SymbolFlags.Alias
    ? checker.getAliasedSymbol(symbol)
    : symbol;
};

/**
 * Libraries owning any declaration of a symbol
 */
const librariesDeclaring = (
  symbol: ts.Symbol,
  libraries: readonly TemporalLibrary[]
): readonly TemporalLibrary[] =>
  (symbol.getDeclarations() ?? []).flatMap((declaration) => {
    const moduleName = moduleOfNode(declaration);
    const library =
      moduleName === undefined
        ? undefined
        : findLibraryForModule(libraries, moduleName);
    return library ? [library] : [];
  });

export const createTypeResolver = (
  checker: ts.TypeChecker,
  libraries: readonly TemporalLibrary[]
): TypeResolver<ts.Type> => ({
  isSameType: (left, right) => left === right,

  isTemporalAccessor: (type) => {
    const symbol = symbolOf(checker, type);
    if (symbol === undefined) {
      return false;
    }
    const name = symbol.getName();
    return librariesDeclaring(symbol, libraries).some(
      (library) => library.accessorType === name
    );
  },

  tagOf: (type): TemporalTypeTag | undefined => {
    const symbol = symbolOf(checker, type);
    if (symbol === undefined) {
      return undefined;
    }
    const name = symbol.getName();
    if (!isTemporalTypeTag(name)) {
      return undefined;
    }
    return librariesDeclaring(symbol, libraries).some((library) =>
      library.types.includes(name)
    )
      ? name
      : undefined;
  },
});

export type CallSiteContext = {
  readonly sourceFile: ts.SourceFile;
  readonly checker: ts.TypeChecker;
  readonly resolver: TypeResolver<ts.Type>;
  readonly libraries: readonly TemporalLibrary[];
  readonly isTrustedFile: (fileName: string) => boolean;
};

const isStatic = (declaration: ts.Declaration): boolean =>
  (ts.getCombinedModifierFlags(declaration) & ts.ModifierFlags.Static) !== 0;

/**
 * `Receiver.from(arg)`: the callee, when the call has that syntax
 */
export const getFromCallee = (
  node: ts.CallExpression
): ts.PropertyAccessExpression | undefined =>
  ts.isPropertyAccessExpression(node.expression) &&
  node.expression.name.text === "from" &&
  node.arguments.length === 1 &&
  !node.arguments.some(ts.isSpreadElement)
    ? node.expression
    : undefined;

export const createCandidateCall = (
  node: ts.CallExpression,
  context: CallSiteContext
): CandidateCall<ts.Type> => {
  const { checker, resolver, sourceFile } = context;
  const callee = getFromCallee(node);
  const argument = node.arguments[0];

  return {
    isFromAccessorShape: () => {
      if (callee === undefined) {
        return false;
      }
      const declaration = checker.getResolvedSignature(node)?.getDeclaration();
      if (
        declaration === undefined ||
        !ts.isMethodDeclaration(declaration) ||
        !isStatic(declaration)
      ) {
        return false;
      }
      const [parameter, ...rest] = declaration.parameters;
      if (
        parameter === undefined ||
        rest.length > 0 ||
        parameter.dotDotDotToken !== undefined ||
        parameter.type === undefined
      ) {
        return false;
      }
      return resolver.isTemporalAccessor(
        checker.getTypeFromTypeNode(parameter.type)
      );
    },

    isInTrustedScope: () =>
      isLibraryModule(context.libraries, moduleOfNode(node)) ||
      context.isTrustedFile(sourceFile.fileName),

    receiverType: () =>
      callee === undefined
        ? undefined
        : resolved(checker.getTypeAtLocation(callee.expression)),

    argumentType: () =>
      argument === undefined
        ? undefined
        : resolved(checker.getTypeAtLocation(argument)),

    resultType: () => resolved(checker.getTypeAtLocation(node)),

    argumentText: () =>
      argument === undefined ? "" : argument.getText(sourceFile),
  };
};
