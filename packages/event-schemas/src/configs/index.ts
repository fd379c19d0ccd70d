export * from "./stateless.js";
export * from "./load.js";
