// Model public API - foundation types (imports nothing outside model/)

// Identity - (name, revision) keys and revision ordering
export * from "./identity.js";

// Phases - ordered processing steps
export * from "./phase.js";

// Sources - declared statement trees and module descriptors
export * from "./source.js";

// Effective statements - immutable output shapes
export * from "./effective.js";

// Diagnostics - foundation diagnostic types
export * from "./diagnostics.js";
