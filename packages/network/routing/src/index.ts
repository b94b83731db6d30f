export * from "./path.js";
export * from "./route.js";
export * from "./overload.js";
