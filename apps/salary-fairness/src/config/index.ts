/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadAnalysisConfig,
    loadAnalysisConfigWithFallback,
    parseAnalysisConfig,
    getDefaultAnalysisConfig,
    type AnalysisConfig,
    type SensitiveGroup,
} from "./loadConfig.js";
