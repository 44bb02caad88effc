/**
 * @fileoverview Factor Algebra
 *
 * Pure operations on factors: restrict (apply evidence), multiply (join),
 * sum-out (marginalize), normalize, and scope reordering. None of them
 * touch their inputs; each returns a new frozen factor.
 *
 * All table walks share one odometer over the result scope. For every
 * input table we precompute the stride each result variable has in that
 * input (0 when the input does not mention it), so offsets advance by
 * addition instead of being recomputed per entry.
 *
 * Scope order contract:
 * - restrict / sumOut: input scope minus the variable, relative order kept
 * - multiply: `a.scope`, then the variables of `b.scope` not already present
 *
 * @module @bayesfair/engine/algebra/factorAlgebra
 */

import {
    DegenerateDistributionError,
    InvalidEvidenceError,
    InvalidVariableError,
} from "../contracts/errors.js";
import {
    createFactor,
    factorSize,
    scopeIndexOf,
    strides,
    type Factor,
} from "../contracts/Factor.js";
import { indexOfOutcome, type Variable } from "../contracts/Variable.js";

/**
 * Stride of each `target` variable inside `source` (0 if absent).
 */
function alignedStrides(target: readonly Variable[], source: readonly Variable[]): number[] {
    const sourceStrides = strides(source);
    return target.map((variable) => {
        const index = source.findIndex((v) => v.name === variable.name);
        return index < 0 ? 0 : sourceStrides[index];
    });
}

/**
 * Visit every assignment of `scope` in row-major order, passing the
 * matching flat offset into each aligned source table.
 */
function forEachAssignment(
    scope: readonly Variable[],
    aligned: readonly (readonly number[])[],
    visit: (offsets: readonly number[]) => void
): void {
    const sizes = scope.map((variable) => variable.domain.length);
    const counters = new Array<number>(scope.length).fill(0);
    const offsets = new Array<number>(aligned.length).fill(0);
    const total = factorSize(scope);

    for (let n = 0; n < total; n++) {
        visit(offsets);

        for (let i = scope.length - 1; i >= 0; i--) {
            counters[i]++;
            for (let j = 0; j < aligned.length; j++) {
                offsets[j] += aligned[j][i];
            }
            if (counters[i] < sizes[i]) {
                break;
            }
            for (let j = 0; j < aligned.length; j++) {
                offsets[j] -= aligned[j][i] * sizes[i];
            }
            counters[i] = 0;
        }
    }
}

/**
 * Restrict a factor to the slice where `variable` takes `value`.
 *
 * @param factor - Input factor (not modified)
 * @param variable - Variable to fix; must be in the factor's scope
 * @param value - Label from the variable's domain
 * @returns Factor over the remaining scope
 * @throws InvalidEvidenceError if the variable is not in scope or the value
 *         is not one of its outcomes
 *
 * @example
 * ```typescript
 * // P(Work | Salary) restricted to Work = "Self" gives a factor over [Salary]
 * const slice = restrict(workCpt, work, "Self");
 * ```
 */
export function restrict(factor: Factor, variable: Variable, value: string): Factor {
    const position = scopeIndexOf(factor, variable);
    if (position < 0) {
        throw new InvalidEvidenceError(
            `Variable "${variable.name}" is not in the scope of factor "${factor.name}"`
        );
    }

    const scoped = factor.scope[position];
    const outcome = indexOfOutcome(scoped, value);
    if (outcome < 0) {
        throw new InvalidEvidenceError(
            `"${value}" is not an outcome of variable "${scoped.name}"`
        );
    }

    const scope = factor.scope.filter((_, i) => i !== position);
    const base = outcome * strides(factor.scope)[position];
    const values: number[] = [];

    forEachAssignment(scope, [alignedStrides(scope, factor.scope)], ([offset]) => {
        values.push(factor.values[base + offset]);
    });

    return createFactor(factor.name, scope, values);
}

/**
 * Pointwise product over the union of two scopes.
 *
 * A factor with an empty scope acts as a scalar and scales the other.
 *
 * @returns Factor over `a.scope` followed by the new variables of `b.scope`
 */
export function multiply(a: Factor, b: Factor): Factor {
    const scope = [...a.scope];
    for (const variable of b.scope) {
        if (!scope.some((v) => v.name === variable.name)) {
            scope.push(variable);
        }
    }

    const values: number[] = [];
    forEachAssignment(
        scope,
        [alignedStrides(scope, a.scope), alignedStrides(scope, b.scope)],
        ([offsetA, offsetB]) => {
            values.push(a.values[offsetA] * b.values[offsetB]);
        }
    );

    return createFactor(`${a.name} * ${b.name}`, scope, values);
}

/**
 * Left fold of {@link multiply}. An empty list gives the unit scalar.
 */
export function multiplyAll(factors: readonly Factor[]): Factor {
    if (factors.length === 0) {
        return createFactor("unit", [], [1]);
    }
    return factors.slice(1).reduce((product, factor) => multiply(product, factor), factors[0]);
}

/**
 * Marginalize a variable out of a factor.
 *
 * @param factor - Input factor (not modified)
 * @param variable - Variable to eliminate
 * @returns Factor over the remaining scope
 * @throws InvalidVariableError if the variable is not in scope
 */
export function sumOut(factor: Factor, variable: Variable): Factor {
    const position = scopeIndexOf(factor, variable);
    if (position < 0) {
        throw new InvalidVariableError(
            `Cannot sum out "${variable.name}": not in the scope of factor "${factor.name}"`
        );
    }

    const eliminated = factor.scope[position];
    const step = strides(factor.scope)[position];
    const scope = factor.scope.filter((_, i) => i !== position);
    const values: number[] = [];

    forEachAssignment(scope, [alignedStrides(scope, factor.scope)], ([offset]) => {
        let total = 0;
        for (let k = 0; k < eliminated.domain.length; k++) {
            total += factor.values[offset + k * step];
        }
        values.push(total);
    });

    return createFactor(factor.name, scope, values);
}

/**
 * Scale a factor so its entries sum to 1.
 *
 * @throws DegenerateDistributionError if the entries sum to zero
 */
export function normalize(factor: Factor): Factor {
    const total = factor.values.reduce((sum, value) => sum + value, 0);
    if (total === 0) {
        throw new DegenerateDistributionError(factor.name);
    }

    return createFactor(
        factor.name,
        factor.scope,
        factor.values.map((value) => value / total)
    );
}

/**
 * Permute a factor onto another ordering of the same scope.
 *
 * @param factor - Input factor (not modified)
 * @param scope - Target ordering; must hold exactly the factor's variables
 * @returns Factor with the same entries laid out for `scope`
 * @throws InvalidVariableError if the scopes differ as sets
 */
export function reorderScope(factor: Factor, scope: readonly Variable[]): Factor {
    const sameSet =
        scope.length === factor.scope.length &&
        scope.every((variable) => scopeIndexOf(factor, variable) >= 0);
    if (!sameSet) {
        throw new InvalidVariableError(
            `Cannot reorder factor "${factor.name}" onto [${scope.map((v) => v.name).join(", ")}]`
        );
    }

    const target = scope.map((variable) => factor.scope[scopeIndexOf(factor, variable)]);
    const values: number[] = [];
    forEachAssignment(target, [alignedStrides(target, factor.scope)], ([offset]) => {
        values.push(factor.values[offset]);
    });

    return createFactor(factor.name, target, values);
}
