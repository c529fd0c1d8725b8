/**
 * Document Parser Module
 *
 * @module
 */

export * from "./yaml-parser.js";
