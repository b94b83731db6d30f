export * from "./topology.js";
export * from "./generate.js";
