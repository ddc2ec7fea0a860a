// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./context.js";
export * from "./handlers/insert-resource.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/lsp-types.js";
export * from "./services/compilation-manager.js";
export * from "./services/configuration.js";
export * from "./services/file-resolver.js";
export * from "./services/resource-client.js";
export * from "./services/type-catalog.js";
export type { Logger } from "./services/types.js";
