/**
 * Core package centralizes the job configuration, error taxonomy and logging.
 * Every other workspace depends on these primitives.
 */
export * from "./config";
export * from "./errors";
export { loadEnvFiles } from "./env";
export * from "./utils/logger";
