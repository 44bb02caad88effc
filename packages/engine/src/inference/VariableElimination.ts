/**
 * @fileoverview Variable Elimination
 *
 * Exact posterior marginals over a BayesNetwork.
 *
 * Pipeline per query:
 * 1. Resolve evidence against the network
 * 2. Restrict every CPT by every observation in its scope
 * 3. For each hidden variable (in elimination order): multiply the
 *    factors that mention it, sum it out, keep the result
 * 4. Multiply what is left and normalize over the query variable
 *
 * The result does not depend on the elimination order; only the size of
 * the intermediate factors does. Declaration order is the default.
 *
 * `infer` only reads the network. The {@link VariableEliminationEngine}
 * wraps it with an optional posterior cache tied to one network.
 *
 * @module @bayesfair/engine/inference/VariableElimination
 */

import { getVariable, type BayesNetwork } from "../contracts/BayesNetwork.js";
import { InvalidEvidenceError, InvalidVariableError } from "../contracts/errors.js";
import { resolveEvidence, type Evidence } from "../contracts/Evidence.js";
import type { Factor } from "../contracts/Factor.js";
import { silentLogger, type InferenceLogger } from "../contracts/Logger.js";
import { posteriorFromFactor, type Posterior } from "../contracts/Posterior.js";
import {
    multiplyAll,
    normalize,
    reorderScope,
    restrict,
    sumOut,
} from "../algebra/factorAlgebra.js";

/**
 * Options for a single inference call.
 */
export interface InferenceOptions {
    /**
     * Names of the hidden variables, in the order to eliminate them.
     * Must list exactly the variables that are neither queried nor observed.
     * Defaults to the network's declaration order.
     */
    readonly eliminationOrder?: readonly string[];

    /** Receives one debug entry per elimination step */
    readonly logger?: InferenceLogger;
}

function hiddenVariables(network: BayesNetwork, query: string, evidence: Evidence): string[] {
    return [...network.variables.keys()].filter((name) => name !== query && !Object.hasOwn(evidence, name));
}

function resolveOrder(hidden: readonly string[], requested: readonly string[] | undefined): readonly string[] {
    if (!requested) {
        return hidden;
    }

    const sorted = (names: readonly string[]) => [...names].sort().join("\u0000");
    if (requested.length !== hidden.length || sorted(requested) !== sorted(hidden)) {
        throw new InvalidVariableError(
            `Elimination order [${requested.join(", ")}] must list exactly the hidden variables [${hidden.join(", ")}]`
        );
    }
    return requested;
}

/**
 * Compute the normalized posterior factor over `query` given `evidence`.
 *
 * @param network - Network to query (read only)
 * @param query - Name of the query variable
 * @param evidence - Observed labels by attribute name; must not assign `query`
 * @param options - Elimination order and logger
 * @returns Factor with scope `[query]` whose entries sum to 1
 * @throws UnknownVariableError if `query` is not in the network
 * @throws InvalidEvidenceError for evidence on the query, unknown names or out-of-domain labels
 * @throws InvalidVariableError for an elimination order that does not match the hidden variables
 * @throws DegenerateDistributionError if the evidence has probability zero
 */
export function inferFactor(
    network: BayesNetwork,
    query: string,
    evidence: Evidence = {},
    options: InferenceOptions = {}
): Factor {
    const logger = options.logger ?? silentLogger;
    const queryVariable = getVariable(network, query);

    if (Object.hasOwn(evidence, query)) {
        throw new InvalidEvidenceError(`Evidence must not assign the query variable "${query}"`);
    }

    const observations = resolveEvidence(network, evidence);
    const order = resolveOrder(hiddenVariables(network, query, evidence), options.eliminationOrder);

    let factors: Factor[] = [...network.factors.values()].map((cpt) =>
        observations.reduce(
            (factor, { variable, value }) =>
                factor.scope.some((v) => v.name === variable.name) ? restrict(factor, variable, value) : factor,
            cpt
        )
    );

    for (const name of order) {
        const variable = getVariable(network, name);
        const mentioning = factors.filter((f) => f.scope.some((v) => v.name === name));
        if (mentioning.length === 0) {
            continue;
        }

        const reduced = sumOut(multiplyAll(mentioning), variable);
        factors = [...factors.filter((f) => !mentioning.includes(f)), reduced];

        logger.debug("Eliminated variable", {
            variable: name,
            joined  : mentioning.length,
            size    : reduced.values.length,
        });
    }

    const joint = multiplyAll(factors);
    return normalize(reorderScope(joint, [queryVariable]));
}

/**
 * Compute the posterior distribution over `query` given `evidence`.
 *
 * @example
 * ```typescript
 * const posterior = infer(bn, "Salary", { Work: "Self" });
 * posterior.probabilities[">=50K"]; // e.g. 0.4
 * ```
 *
 * @see inferFactor for parameters and failure modes
 */
export function infer(
    network: BayesNetwork,
    query: string,
    evidence: Evidence = {},
    options: InferenceOptions = {}
): Posterior {
    return posteriorFromFactor(inferFactor(network, query, evidence, options));
}

/**
 * Memo of posteriors for one network, keyed by the exact query and
 * evidence (order-insensitive).
 */
export class PosteriorCache {
    private readonly entries: Map<string, Posterior> = new Map();

    static key(query: string, evidence: Evidence): string {
        const pairs = Object.entries(evidence).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return JSON.stringify([query, pairs]);
    }

    get(query: string, evidence: Evidence): Posterior | undefined {
        return this.entries.get(PosteriorCache.key(query, evidence));
    }

    set(query: string, evidence: Evidence, posterior: Posterior): void {
        this.entries.set(PosteriorCache.key(query, evidence), posterior);
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }
}

/**
 * Engine configuration options.
 */
export interface VariableEliminationConfig {
    /** Memoize posteriors per (query, evidence) (default: false) */
    readonly cache?: boolean;

    /** Logger passed to every inference call */
    readonly logger?: InferenceLogger;
}

/**
 * Holds a network and answers posterior queries against it.
 *
 * @example
 * ```typescript
 * const engine = new VariableEliminationEngine(bn, { cache: true });
 * engine.posterior("Salary", { Work: "Private" });
 *
 * // Retrained model: swap it in, cached posteriors are dropped
 * engine.rebuild(buildNaiveBayes(newRows, "Salary"));
 * ```
 */
export class VariableEliminationEngine {
    private currentNetwork: BayesNetwork;
    private readonly cache: PosteriorCache | null;
    private readonly logger: InferenceLogger;

    constructor(network: BayesNetwork, config: VariableEliminationConfig = {}) {
        this.currentNetwork = network;
        this.cache = config.cache ? new PosteriorCache() : null;
        this.logger = config.logger ?? silentLogger;
    }

    get network(): BayesNetwork {
        return this.currentNetwork;
    }

    /** Number of cached posteriors (0 when caching is off) */
    get cachedCount(): number {
        return this.cache?.size ?? 0;
    }

    posterior(query: string, evidence: Evidence = {}): Posterior {
        const cached = this.cache?.get(query, evidence);
        if (cached) {
            return cached;
        }

        const posterior = infer(this.currentNetwork, query, evidence, { logger: this.logger });
        this.cache?.set(query, evidence, posterior);
        return posterior;
    }

    /**
     * Replace the network and invalidate every cached posterior.
     */
    rebuild(network: BayesNetwork): void {
        this.currentNetwork = network;
        this.cache?.clear();
        this.logger.info("Network replaced", { network: network.name });
    }
}
