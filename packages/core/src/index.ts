/**
 * @domodel/core
 *
 * In-memory domain models: schema loading with multiple inheritance,
 * an entity store, typed attribute and relation writes, and validation.
 */

// Errors
export * from "./errors"

// Logging
export * from "./logging"

// Schema
export * from "./schema"

// Store
export * from "./store"

// Engine
export * from "./engine"

// Validation
export * from "./validation"

// Model
export * from "./model"
