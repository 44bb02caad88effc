/**
 * Posterior Contract
 *
 * A normalized distribution over one variable's outcomes, with explicit
 * probability values keyed by label. This is what `infer` hands to
 * classification and fairness code.
 */

import { InvalidEvidenceError, InvalidFactorError } from "./errors.js";
import type { Factor } from "./Factor.js";
import { indexOfOutcome, type Variable } from "./Variable.js";

/**
 * Posterior marginal over a single variable.
 */
export interface Posterior {
    /** The queried variable */
    readonly variable: Variable;

    /** Label -> probability, in domain order; sums to 1 */
    readonly probabilities: Readonly<Record<string, number>>;
}

/**
 * Build a Posterior from a normalized single-variable factor.
 *
 * @param factor - Factor whose scope is exactly one variable
 * @returns Frozen Posterior
 * @throws InvalidFactorError if the factor's scope is not a single variable
 */
export function posteriorFromFactor(factor: Factor): Posterior {
    if (factor.scope.length !== 1) {
        throw new InvalidFactorError(
            `Posterior needs a single-variable factor, "${factor.name}" has ${factor.scope.length}`
        );
    }

    const variable = factor.scope[0];
    const probabilities: Record<string, number> = {};
    variable.domain.forEach((label, i) => {
        probabilities[label] = factor.values[i];
    });

    return Object.freeze({
        variable,
        probabilities: Object.freeze(probabilities),
    });
}

/**
 * Probability of one outcome.
 *
 * @throws InvalidEvidenceError if the label is not an outcome of the variable
 */
export function probabilityOf(posterior: Posterior, label: string): number {
    if (indexOfOutcome(posterior.variable, label) < 0) {
        throw new InvalidEvidenceError(
            `"${label}" is not an outcome of variable "${posterior.variable.name}"`
        );
    }
    return posterior.probabilities[label];
}
