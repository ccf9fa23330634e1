// Compiler package public API
//
// Import from here rather than deep paths for stability.

// === Model ===
export * from "./model/index.js";

// === Shared infrastructure ===
export * from "./shared/index.js";

// === Module ordering ===
export * from "./graph/index.js";

// === Reactor ===
export * from "./reactor/index.js";

// === Effective model ===
export { EffectiveTreeBuilder, effectiveStatement } from "./effective/builder.js";
export { createSchemaContext, EMPTY_SCHEMA_CONTEXT, type SchemaContext } from "./schema/schema-context.js";
