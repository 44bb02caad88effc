/**
 * Factor Contract
 *
 * A non-negative real-valued table over the cross-product of an ordered
 * scope of variables. CPTs, joint tables and intermediate products are
 * all factors.
 *
 * Layout: `values` is dense and row-major over the scope, so the last
 * scope variable varies fastest. An empty scope holds one scalar.
 *
 * Factors are frozen. Algebra operations always build new factors.
 */

import { InvalidEvidenceError, InvalidFactorError } from "./errors.js";
import { indexOfOutcome, type Variable } from "./Variable.js";

/**
 * Immutable factor.
 */
export interface Factor {
    /** Display name, e.g. "Salary" or "Work,Salary" */
    readonly name: string;

    /** Ordered, distinct variables */
    readonly scope: readonly Variable[];

    /** One entry per assignment of the scope, row-major */
    readonly values: readonly number[];
}

/**
 * Number of table entries for a scope.
 */
export function factorSize(scope: readonly Variable[]): number {
    return scope.reduce((size, variable) => size * variable.domain.length, 1);
}

/**
 * Row-major strides for a scope: `strides[i]` is how far the flat index
 * moves when `scope[i]` advances by one outcome.
 */
export function strides(scope: readonly Variable[]): number[] {
    const result = new Array<number>(scope.length);
    let stride = 1;
    for (let i = scope.length - 1; i >= 0; i--) {
        result[i] = stride;
        stride *= scope[i].domain.length;
    }
    return result;
}

/**
 * Position of a variable in a factor's scope (by name).
 *
 * @returns The index, or -1 if the variable is not in scope
 */
export function scopeIndexOf(factor: Factor, variable: Variable): number {
    return factor.scope.findIndex((v) => v.name === variable.name);
}

/**
 * Factory function to create a Factor.
 *
 * @param name - Display name
 * @param scope - Ordered variables (distinct by name)
 * @param values - Row-major table, one finite non-negative entry per assignment
 * @returns Frozen Factor
 * @throws InvalidFactorError if the table does not fit the scope
 *
 * @example
 * ```typescript
 * const prior = createFactor("Salary", [salary], [0.75, 0.25]);
 * ```
 */
export function createFactor(
    name: string,
    scope: readonly Variable[],
    values: readonly number[]
): Factor {
    const names = new Set<string>();
    for (const variable of scope) {
        if (names.has(variable.name)) {
            throw new InvalidFactorError(`Factor "${name}" repeats variable "${variable.name}" in its scope`);
        }
        names.add(variable.name);
    }

    const expected = factorSize(scope);
    if (values.length !== expected) {
        throw new InvalidFactorError(
            `Factor "${name}" expects ${expected} values for its scope, got ${values.length}`
        );
    }

    values.forEach((value, index) => {
        if (!Number.isFinite(value) || value < 0) {
            throw new InvalidFactorError(
                `Factor "${name}" has invalid value ${value} at index ${index}`
            );
        }
    });

    const factor: Factor = {
        name,
        scope : Object.freeze([...scope]),
        values: Object.freeze([...values]),
    };

    return Object.freeze(factor);
}

/**
 * Look up the entry for a full assignment of the scope.
 *
 * @param factor - The factor to read
 * @param assignment - One label per scope variable, in scope order
 * @returns The table entry
 * @throws InvalidEvidenceError if the assignment has the wrong length
 *         or a label is outside its variable's domain
 */
export function getFactorValue(factor: Factor, assignment: readonly string[]): number {
    if (assignment.length !== factor.scope.length) {
        throw new InvalidEvidenceError(
            `Factor "${factor.name}" needs ${factor.scope.length} labels, got ${assignment.length}`
        );
    }

    const steps = strides(factor.scope);
    let offset = 0;
    factor.scope.forEach((variable, i) => {
        const position = indexOfOutcome(variable, assignment[i]);
        if (position < 0) {
            throw new InvalidEvidenceError(
                `"${assignment[i]}" is not an outcome of variable "${variable.name}"`
            );
        }
        offset += position * steps[i];
    });

    return factor.values[offset];
}
