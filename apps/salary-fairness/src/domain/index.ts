/**
 * @fileoverview Domain barrel exports
 *
 * Fairness statistics computed from a trained salary network.
 *
 * @module domain
 */

export * from "./fairness/index.js";
