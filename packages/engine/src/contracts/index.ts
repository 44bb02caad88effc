/**
 * @fileoverview Contract barrel exports
 *
 * Data types, validation factories and errors shared by the algebra,
 * the builder and the elimination engine.
 *
 * @module @bayesfair/engine/contracts
 */

// Variable
export type { Variable } from "./Variable.js";
export { createVariable, sameVariable, indexOfOutcome } from "./Variable.js";

// Factor
export type { Factor } from "./Factor.js";
export {
    createFactor,
    factorSize,
    strides,
    scopeIndexOf,
    getFactorValue,
} from "./Factor.js";

// Bayesian network
export type { BayesNetwork, BayesNetworkInput } from "./BayesNetwork.js";
export { createBayesNetwork, getVariable, getCpt } from "./BayesNetwork.js";

// Evidence
export type { Evidence, Observation } from "./Evidence.js";
export { resolveEvidence } from "./Evidence.js";

// Posterior
export type { Posterior } from "./Posterior.js";
export { posteriorFromFactor, probabilityOf } from "./Posterior.js";

// Classification output
export type {
    ClassificationOutput,
    OutcomeLabel,
} from "./ClassificationOutput.js";
export {
    createClassificationOutput,
} from "./ClassificationOutput.js";

// Logger
export type { InferenceLogger } from "./Logger.js";
export { silentLogger } from "./Logger.js";

// Errors
export type { InferenceErrorCode } from "./errors.js";
export {
    InferenceError,
    InvalidEvidenceError,
    InvalidVariableError,
    UnknownVariableError,
    InvalidFactorError,
    DegenerateDistributionError,
    EmptyDatasetError,
    MissingClassColumnError,
    InvalidDatasetError,
    isInferenceError,
} from "./errors.js";
