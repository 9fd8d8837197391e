/**
 * Validation Module
 *
 * Exports validation schemas and middleware.
 */

export * from "./schemas";

export { validateBody } from "./middleware";
