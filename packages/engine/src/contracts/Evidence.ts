/**
 * Evidence Contract
 *
 * Observed values for some of a network's variables. Callers supply
 * evidence by attribute name; the engine resolves it against the
 * network before restricting any factor.
 */

import type { BayesNetwork } from "./BayesNetwork.js";
import { InvalidEvidenceError } from "./errors.js";
import { indexOfOutcome, type Variable } from "./Variable.js";

/**
 * Partial assignment: attribute name -> observed label.
 *
 * @example
 * ```typescript
 * const evidence: Evidence = { Work: "Private", Gender: "Female" };
 * ```
 */
export type Evidence = Readonly<Record<string, string>>;

/**
 * One observation resolved against a network.
 */
export interface Observation {
    readonly variable: Variable;
    readonly value: string;
}

/**
 * Resolve named evidence into observations, in the evidence's key order.
 *
 * @param network - The network the evidence refers to
 * @param evidence - Attribute name -> label
 * @returns Observations with the network's Variable objects
 * @throws InvalidEvidenceError for unknown attribute names or out-of-domain labels
 */
export function resolveEvidence(network: BayesNetwork, evidence: Evidence): Observation[] {
    return Object.entries(evidence).map(([name, value]) => {
        const variable = network.variables.get(name);
        if (!variable) {
            throw new InvalidEvidenceError(`Evidence names unknown variable "${name}"`);
        }

        if (indexOfOutcome(variable, value) < 0) {
            throw new InvalidEvidenceError(
                `Evidence value "${value}" is not an outcome of variable "${name}"`
            );
        }

        return { variable, value };
    });
}
