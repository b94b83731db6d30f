export * from "./config.js";
export * from "./errors.js";
export * from "./traffic.js";
export * from "./env.js";
export * from "./runner.js";
export { cli } from "./cli.js";
