/**
 * Type exports
 *
 * @module types
 */

export * from "./events";
export * from "./options";
export * from "./integration";
export * from "./appStart";
