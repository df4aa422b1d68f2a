export { Registry, type RegistryOptions } from "./registry.js";
export { DEFAULT_RANGE_NAME, FALLBACK_RANGE } from "./schema.js";
