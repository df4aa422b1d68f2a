export * from "./types/port-allocation.js";
export * from "./types/context.js";
export * from "./types/discovery.js";
