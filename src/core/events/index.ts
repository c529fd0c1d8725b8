/**
 * Events Module
 */

export * from "./event-registry.js";
export * from "./project-config-events.js";
