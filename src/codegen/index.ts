// Codegen module - exports all generators and parsers

// Re-export types and errors
export * from "./types.js";
export * from "./errors.js";

// Re-export parsers
export * from "./parsers.js";

// Re-export utilities
export * from "./utils.js";

// Re-export generators
export * from "./region.js";
export * from "./gen-template.js";
export * from "./gen-patch.js";

// Re-export CLI orchestration
export * from "./run.js";
