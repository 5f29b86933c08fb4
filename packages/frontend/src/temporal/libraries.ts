/**
 * Temporal libraries - where the temporal types are declared
 */

import * as ts from "typescript";
import {
  EXTRA_TEMPORAL_TYPE_TAGS,
  PRIMARY_TEMPORAL_TYPE_TAGS,
  type TemporalTypeTag,
} from "./tags.js";

export type TemporalLibrary = {
  readonly name: string;
  /** Package names or ambient module names owning the declarations */
  readonly modules: readonly string[];
  readonly types: readonly TemporalTypeTag[];
  /** Name of the generic accessor capability declared by this library */
  readonly accessorType?: string;
};

export const DEFAULT_TEMPORAL_LIBRARIES: readonly TemporalLibrary[] = [
  {
    name: "js-joda",
    modules: ["@js-joda/core"],
    types: PRIMARY_TEMPORAL_TYPE_TAGS,
    accessorType: "TemporalAccessor",
  },
  {
    name: "js-joda-extra",
    modules: ["@js-joda/extra"],
    types: EXTRA_TEMPORAL_TYPE_TAGS,
  },
];

const NODE_MODULES_PACKAGE = /[\\/]node_modules[\\/]((?:@[^\\/]+[\\/])?[^\\/]+)[\\/]/g;

/**
 * Package name of a file living under node_modules (innermost wins)
 */
export const packageOfFile = (fileName: string): string | undefined => {
  const matches = [...fileName.matchAll(NODE_MODULES_PACKAGE)];
  const last = matches[matches.length - 1];
  return last?.[1]?.replace(/\\/g, "/");
};

/**
 * Name of the ambient `declare module "x"` block enclosing a node
 */
const ambientModuleOf = (node: ts.Node): string | undefined => {
  for (
    let current: ts.Node | undefined = node.parent;
    current;
    current = current.parent
  ) {
    if (ts.isModuleDeclaration(current) && ts.isStringLiteral(current.name)) {
      return current.name.text;
    }
  }
  return undefined;
};

/**
 * Module owning a node: an enclosing ambient module block, else the package
 * its file was installed as. Project code has no owning module.
 */
export const moduleOfNode = (node: ts.Node): string | undefined =>
  ambientModuleOf(node) ?? packageOfFile(node.getSourceFile().fileName);

export const findLibraryForModule = (
  libraries: readonly TemporalLibrary[],
  moduleName: string
): TemporalLibrary | undefined =>
  libraries.find((library) => library.modules.includes(moduleName));

export const isLibraryModule = (
  libraries: readonly TemporalLibrary[],
  moduleName: string | undefined
): boolean =>
  moduleName !== undefined &&
  findLibraryForModule(libraries, moduleName) !== undefined;
