/**
 * @fileoverview Inference Errors
 *
 * Every failure raised by the engine is an {@link InferenceError} with a
 * stable `code`. None of them are transient: they describe malformed input
 * or a query with zero probability under the model, so callers should not
 * retry.
 *
 * @module @bayesfair/engine/contracts/errors
 */

/**
 * Stable error codes, one per failure kind.
 */
export type InferenceErrorCode =
    | "INVALID_EVIDENCE"
    | "INVALID_VARIABLE"
    | "UNKNOWN_VARIABLE"
    | "INVALID_FACTOR"
    | "DEGENERATE_DISTRIBUTION"
    | "EMPTY_DATASET"
    | "MISSING_CLASS_COLUMN"
    | "INVALID_DATASET";

/**
 * Base class for all engine errors.
 */
export class InferenceError extends Error {
    readonly code: InferenceErrorCode;

    constructor(code: InferenceErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Evidence names a variable that is not in scope, or a label outside
 * the variable's domain.
 */
export class InvalidEvidenceError extends InferenceError {
    constructor(message: string) {
        super("INVALID_EVIDENCE", message);
    }
}

/**
 * An operation references a variable missing from a factor's scope,
 * or a variable definition is malformed.
 */
export class InvalidVariableError extends InferenceError {
    constructor(message: string) {
        super("INVALID_VARIABLE", message);
    }
}

/**
 * A query names a variable that the network does not contain.
 */
export class UnknownVariableError extends InferenceError {
    readonly variableName: string;

    constructor(variableName: string) {
        super("UNKNOWN_VARIABLE", `Unknown variable: ${variableName}`);
        this.variableName = variableName;
    }
}

/**
 * A factor table does not match its scope.
 */
export class InvalidFactorError extends InferenceError {
    constructor(message: string) {
        super("INVALID_FACTOR", message);
    }
}

/**
 * Normalization would divide by zero: the evidence has zero
 * probability under the model.
 */
export class DegenerateDistributionError extends InferenceError {
    constructor(factorName: string) {
        super(
            "DEGENERATE_DISTRIBUTION",
            `Cannot normalize factor "${factorName}": total probability mass is zero`
        );
    }
}

export class EmptyDatasetError extends InferenceError {
    constructor() {
        super("EMPTY_DATASET", "Cannot build a network from zero rows");
    }
}

export class MissingClassColumnError extends InferenceError {
    readonly rowIndex: number;

    constructor(classAttribute: string, rowIndex: number) {
        super(
            "MISSING_CLASS_COLUMN",
            `Row ${rowIndex} has no value for class attribute "${classAttribute}"`
        );
        this.rowIndex = rowIndex;
    }
}

/**
 * A training row is missing an attribute, holds a value outside a
 * declared domain, or the builder options are out of range.
 */
export class InvalidDatasetError extends InferenceError {
    constructor(message: string) {
        super("INVALID_DATASET", message);
    }
}

/**
 * Type guard for engine errors.
 *
 * @param error - Any thrown value
 * @returns True if the value is an InferenceError
 */
export function isInferenceError(error: unknown): error is InferenceError {
    return error instanceof InferenceError;
}
