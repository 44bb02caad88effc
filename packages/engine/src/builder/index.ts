/**
 * @fileoverview Builder barrel exports
 *
 * @module @bayesfair/engine/builder
 */

export {
    buildNaiveBayes,
    cptFactorName,
    kDEFAULT_SMOOTHING,
    type NaiveBayesOptions,
    type TrainingRow,
} from "./NaiveBayesBuilder.js";
