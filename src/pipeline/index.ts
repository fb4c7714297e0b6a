export * from "./state.js";
export * from "./truncate.js";
export * from "./records.js";
export * from "./controller.js";
