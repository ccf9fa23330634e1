import { StatementRegistry, type StatementDefinition } from "@schema-reactor/compiler";
import { containerStatement, keyStatement, leafListStatement, leafStatement, listStatement } from "./data-statements.js";
import { augmentStatement, groupingStatement, usesStatement } from "./grouping-statements.js";
import {
  contactStatement,
  descriptionStatement,
  namespaceStatement,
  organizationStatement,
  prefixStatement,
  referenceStatement,
  revisionDateStatement,
  revisionStatement,
} from "./meta-statements.js";
import {
  belongsToStatement,
  importStatement,
  includeStatement,
  moduleStatement,
  submoduleStatement,
} from "./module-statements.js";
import { typedefStatement, typeStatement } from "./type-statements.js";

export const DEFAULT_STATEMENTS: readonly StatementDefinition[] = [
  moduleStatement,
  submoduleStatement,
  importStatement,
  includeStatement,
  belongsToStatement,
  namespaceStatement,
  prefixStatement,
  revisionStatement,
  revisionDateStatement,
  organizationStatement,
  contactStatement,
  descriptionStatement,
  referenceStatement,
  containerStatement,
  listStatement,
  keyStatement,
  leafStatement,
  leafListStatement,
  typedefStatement,
  typeStatement,
  groupingStatement,
  usesStatement,
  augmentStatement,
];

/** A fresh registry holding the default statement set, plus any extra definitions. */
export function createDefaultRegistry(extra: Iterable<StatementDefinition> = []): StatementRegistry {
  const registry = new StatementRegistry(DEFAULT_STATEMENTS);
  for (const definition of extra) registry.register(definition);
  return registry;
}
