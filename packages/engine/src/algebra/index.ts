/**
 * @fileoverview Algebra barrel exports
 *
 * @module @bayesfair/engine/algebra
 */

export {
    restrict,
    multiply,
    multiplyAll,
    sumOut,
    normalize,
    reorderScope,
} from "./factorAlgebra.js";
