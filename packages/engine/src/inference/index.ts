/**
 * @fileoverview Inference barrel exports
 *
 * @module @bayesfair/engine/inference
 */

export {
    infer,
    inferFactor,
    PosteriorCache,
    VariableEliminationEngine,
    type InferenceOptions,
    type VariableEliminationConfig,
} from "./VariableElimination.js";
export {
    argmax,
    predict,
    classify,
    probabilityAbove,
    type PredictOptions,
} from "./predict.js";
