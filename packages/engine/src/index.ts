/**
 * @fileoverview Bayes Fairness Engine
 *
 * Exact inference over discrete Bayesian networks.
 *
 * The engine provides:
 * - Immutable Variable and Factor types with validated tables
 * - Pure factor algebra: restrict, multiply, sum-out, normalize
 * - Naive Bayes network construction with add-k smoothing
 * - Variable elimination for posterior marginals
 * - Prediction with a deterministic tie-break (domain order)
 *
 * @module @bayesfair/engine
 * @example
 * ```typescript
 * import { buildNaiveBayes, infer, predict } from "@bayesfair/engine";
 *
 * const bn = buildNaiveBayes(rows, "Salary");
 * const posterior = infer(bn, "Salary", { Work: "Private" });
 * const label = predict(bn, { Work: "Private", Gender: "Female" });
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Variable & Factor
export type { Variable, Factor } from "./contracts/index.js";
export {
    createVariable,
    sameVariable,
    indexOfOutcome,
    createFactor,
    factorSize,
    strides,
    scopeIndexOf,
    getFactorValue,
} from "./contracts/index.js";

// Bayesian network, evidence, posterior
export type {
    BayesNetwork,
    BayesNetworkInput,
    Evidence,
    Observation,
    Posterior,
} from "./contracts/index.js";
export {
    createBayesNetwork,
    getVariable,
    getCpt,
    resolveEvidence,
    posteriorFromFactor,
    probabilityOf,
} from "./contracts/index.js";

// Classification output
export type {
    ClassificationOutput,
    OutcomeLabel,
} from "./contracts/index.js";
export {
    createClassificationOutput,
} from "./contracts/index.js";

// Logger
export type { InferenceLogger } from "./contracts/index.js";
export { silentLogger } from "./contracts/index.js";

// Errors
export type { InferenceErrorCode } from "./contracts/index.js";
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
} from "./contracts/index.js";

// ============================================================================
// Algebra exports
// ============================================================================

export {
    restrict,
    multiply,
    multiplyAll,
    sumOut,
    normalize,
    reorderScope,
} from "./algebra/index.js";

// ============================================================================
// Builder exports
// ============================================================================

export {
    buildNaiveBayes,
    cptFactorName,
    kDEFAULT_SMOOTHING,
    type NaiveBayesOptions,
    type TrainingRow,
} from "./builder/index.js";

// ============================================================================
// Inference exports
// ============================================================================

export {
    infer,
    inferFactor,
    PosteriorCache,
    VariableEliminationEngine,
    argmax,
    predict,
    classify,
    probabilityAbove,
    type InferenceOptions,
    type VariableEliminationConfig,
    type PredictOptions,
} from "./inference/index.js";
