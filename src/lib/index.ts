export * from "./api.js";
export * from "./error.js";
export * from "./openapi.js";
export * from "./response.js";
export * from "./zod.js";
export { log } from "./log.js";
