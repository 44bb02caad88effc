/**
 * Variable Contract
 *
 * A named discrete random variable with an ordered domain of outcome
 * labels. The domain order is fixed at construction and defines the
 * index a label takes in every factor table that mentions the variable.
 *
 * Variables are frozen and shared by reference between factors.
 * Two variables are the same variable iff their names are equal.
 */

import { InvalidVariableError } from "./errors.js";

/**
 * Immutable discrete random variable.
 */
export interface Variable {
    /** Unique identifier within a network */
    readonly name: string;

    /** Ordered, distinct outcome labels (at least one) */
    readonly domain: readonly string[];
}

/**
 * Factory function to create a Variable.
 * Validates the domain and freezes the result.
 *
 * @param name - Variable name
 * @param domain - Ordered outcome labels
 * @returns Frozen Variable
 * @throws InvalidVariableError if the name is empty, the domain is empty,
 *         or the domain repeats a label
 *
 * @example
 * ```typescript
 * const salary = createVariable("Salary", ["<50K", ">=50K"]);
 * indexOfOutcome(salary, ">=50K"); // 1
 * ```
 */
export function createVariable(name: string, domain: readonly string[]): Variable {
    if (!name) {
        throw new InvalidVariableError("Variable name must be a non-empty string");
    }

    if (domain.length === 0) {
        throw new InvalidVariableError(`Variable "${name}" must have at least one outcome`);
    }

    const seen = new Set<string>();
    for (const label of domain) {
        if (seen.has(label)) {
            throw new InvalidVariableError(`Variable "${name}" repeats outcome "${label}"`);
        }
        seen.add(label);
    }

    const variable: Variable = {
        name,
        domain: Object.freeze([...domain]),
    };

    return Object.freeze(variable);
}

/**
 * Name equality.
 */
export function sameVariable(a: Variable, b: Variable): boolean {
    return a.name === b.name;
}

/**
 * Position of a label in the variable's domain.
 *
 * @returns The index, or -1 if the label is not an outcome of the variable
 */
export function indexOfOutcome(variable: Variable, label: string): number {
    return variable.domain.indexOf(label);
}
