/**
 * Classification Output
 *
 * The result of classifying one individual: the predicted outcome of
 * the query variable and the posterior mass behind it. This is the
 * boundary between inference and whatever consumes predictions.
 *
 * Frozen on creation; the label is a plain string from the query
 * variable's domain.
 */

/**
 * An outcome label of the query variable, e.g. ">=50K".
 */
export type OutcomeLabel = string;

/**
 * Output from `classify`.
 *
 * @example
 * ```typescript
 * { type: "<50K", confidence: 0.83, tags: ["Work", "Education"] }
 * ```
 */
export interface ClassificationOutput {
    /** The predicted outcome (highest posterior mass, first in domain order on ties) */
    readonly type: OutcomeLabel;

    /** Posterior probability of `type`, between 0.0 and 1.0 */
    readonly confidence: number;

    /** Evidence attribute names the prediction was conditioned on, in evidence order */
    readonly tags: readonly string[];
}

/**
 * Create a frozen ClassificationOutput; `tags` is copied.
 *
 * @throws RangeError if confidence is outside [0, 1]
 */
export function createClassificationOutput(
    type: OutcomeLabel,
    confidence: number,
    tags: readonly string[] = []
): ClassificationOutput {
    if (!(confidence >= 0 && confidence <= 1)) {
        throw new RangeError(`Confidence must be between 0 and 1, got ${confidence}`);
    }

    return Object.freeze({
        type,
        confidence,
        tags: Object.freeze([...tags]),
    });
}
