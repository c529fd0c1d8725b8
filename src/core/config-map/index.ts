/**
 * Config Map Module
 */

export * from "./config-map.js";
