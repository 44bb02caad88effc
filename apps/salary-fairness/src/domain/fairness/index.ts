/**
 * @fileoverview Fairness barrel exports
 *
 * @module domain/fairness
 */

export {
    runFairnessAnalysis,
    explore,
    describeQuestion,
    type FairnessReport,
    type FairnessMetric,
    type FairnessQuestion,
    type FairnessNotion,
    type FairnessOptions,
} from "./FairnessAnalysis.js";
