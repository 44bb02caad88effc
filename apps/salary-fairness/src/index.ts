/**
 * @fileoverview Salary Fairness - Main Entry Point
 *
 * Trains a naive Bayes salary model and reports demographic parity,
 * separation and sufficiency for the two groups of a sensitive
 * attribute.
 *
 * @module salary-fairness
 */

// Load .env before reading any settings from the environment
import "dotenv/config";

import { main } from "./cli/main.js";

process.exitCode = main(process.argv.slice(2), process.env);
