/**
 * Bayesian Network Contract
 *
 * A named set of variables with one conditional probability table per
 * variable. The CPT for `X` has scope `[X, ...parents(X)]`.
 *
 * The algebra and the elimination engine work for any DAG; the builder
 * in this package only produces naive Bayes structures, where every
 * non-class CPT has scope `[X, class]`.
 *
 * Networks are built once and never mutated. Pass them explicitly to
 * every query; there is no shared "current model".
 */

import { InvalidVariableError, UnknownVariableError } from "./errors.js";
import type { Factor } from "./Factor.js";
import type { Variable } from "./Variable.js";

/**
 * Immutable Bayesian network.
 */
export interface BayesNetwork {
    /** Display name */
    readonly name: string;

    /** Variables by name, in declaration order */
    readonly variables: ReadonlyMap<string, Variable>;

    /** CPT of each variable, keyed by the variable's name */
    readonly factors: ReadonlyMap<string, Factor>;

    /** Designated target variable (e.g. "Salary") */
    readonly classVariable: Variable;
}

/**
 * Input for {@link createBayesNetwork}.
 */
export interface BayesNetworkInput {
    readonly name: string;

    /** Variables in declaration order */
    readonly variables: readonly Variable[];

    /** One CPT per variable; the child is the first scope variable */
    readonly factors: readonly Factor[];

    readonly classVariable: Variable;
}

/**
 * Factory function to create a BayesNetwork.
 *
 * @param input - Variables, CPTs and the class variable
 * @returns Frozen BayesNetwork
 * @throws InvalidVariableError if a variable is declared twice, lacks a CPT
 *         or has several, if a CPT mentions a variable outside the network,
 *         or if the class variable is not part of the network
 */
export function createBayesNetwork(input: BayesNetworkInput): BayesNetwork {
    const variables = new Map<string, Variable>();
    for (const variable of input.variables) {
        if (variables.has(variable.name)) {
            throw new InvalidVariableError(`Variable "${variable.name}" is declared twice`);
        }
        variables.set(variable.name, variable);
    }

    if (variables.get(input.classVariable.name) !== input.classVariable) {
        throw new InvalidVariableError(
            `Class variable "${input.classVariable.name}" is not part of network "${input.name}"`
        );
    }

    const factors = new Map<string, Factor>();
    for (const factor of input.factors) {
        if (factor.scope.length === 0) {
            throw new InvalidVariableError(`CPT "${factor.name}" has an empty scope`);
        }

        for (const variable of factor.scope) {
            if (variables.get(variable.name) !== variable) {
                throw new InvalidVariableError(
                    `CPT "${factor.name}" mentions "${variable.name}", which is not a network variable`
                );
            }
        }

        const child = factor.scope[0].name;
        if (factors.has(child)) {
            throw new InvalidVariableError(`Variable "${child}" has more than one CPT`);
        }
        factors.set(child, factor);
    }

    for (const name of variables.keys()) {
        if (!factors.has(name)) {
            throw new InvalidVariableError(`Variable "${name}" has no CPT`);
        }
    }

    // Order the CPT map the same way as the variables.
    const orderedFactors = new Map<string, Factor>();
    for (const name of variables.keys()) {
        const factor = factors.get(name);
        if (factor) {
            orderedFactors.set(name, factor);
        }
    }

    const network: BayesNetwork = {
        name         : input.name,
        variables,
        factors      : orderedFactors,
        classVariable: input.classVariable,
    };

    return Object.freeze(network);
}

/**
 * Look up a variable by name.
 *
 * @throws UnknownVariableError if the network has no such variable
 */
export function getVariable(network: BayesNetwork, name: string): Variable {
    const variable = network.variables.get(name);
    if (!variable) {
        throw new UnknownVariableError(name);
    }
    return variable;
}

/**
 * The CPT of a variable.
 *
 * @throws UnknownVariableError if the network has no such variable
 */
export function getCpt(network: BayesNetwork, name: string): Factor {
    const factor = network.factors.get(name);
    if (!factor) {
        throw new UnknownVariableError(name);
    }
    return factor;
}
