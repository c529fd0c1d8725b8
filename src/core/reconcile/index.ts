/**
 * Reconcile Module
 */

export * from "./reconcile-pass.js";
