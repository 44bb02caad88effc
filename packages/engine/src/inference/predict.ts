/**
 * @fileoverview Prediction
 *
 * Turns posteriors into decisions. The predicted label is the outcome
 * with the largest posterior mass; on an exact tie the outcome that
 * comes first in the variable's domain wins.
 *
 * @module @bayesfair/engine/inference/predict
 */

import type { BayesNetwork } from "../contracts/BayesNetwork.js";
import {
    createClassificationOutput,
    type ClassificationOutput,
    type OutcomeLabel,
} from "../contracts/ClassificationOutput.js";
import type { Evidence } from "../contracts/Evidence.js";
import { probabilityOf, type Posterior } from "../contracts/Posterior.js";
import { infer, type InferenceOptions } from "./VariableElimination.js";

/**
 * Options for {@link predict} and {@link classify}.
 */
export interface PredictOptions extends InferenceOptions {
    /** Variable to predict (default: the network's class variable) */
    readonly query?: string;
}

/**
 * Most probable outcome of a posterior, first in domain order on ties.
 */
export function argmax(posterior: Posterior): OutcomeLabel {
    let best = posterior.variable.domain[0];
    for (const label of posterior.variable.domain) {
        if (posterior.probabilities[label] > posterior.probabilities[best]) {
            best = label;
        }
    }
    return best;
}

/**
 * Predict a label for one individual.
 *
 * @param network - Trained network
 * @param evidence - Observed attributes of the individual
 * @param options - Query variable, elimination order, logger
 * @returns The predicted outcome label
 */
export function predict(
    network: BayesNetwork,
    evidence: Evidence,
    options: PredictOptions = {}
): OutcomeLabel {
    const query = options.query ?? network.classVariable.name;
    return argmax(infer(network, query, evidence, options));
}

/**
 * Like {@link predict}, but also reports the posterior mass of the
 * predicted label and the evidence attributes it was conditioned on.
 */
export function classify(
    network: BayesNetwork,
    evidence: Evidence,
    options: PredictOptions = {}
): ClassificationOutput {
    const query = options.query ?? network.classVariable.name;
    const posterior = infer(network, query, evidence, options);
    const type = argmax(posterior);

    return createClassificationOutput(type, posterior.probabilities[type], Object.keys(evidence));
}

/**
 * Explicit decision boundary: true iff `P(label)` is strictly greater
 * than `threshold`.
 *
 * @throws InvalidEvidenceError if the label is not an outcome of the posterior's variable
 */
export function probabilityAbove(posterior: Posterior, label: OutcomeLabel, threshold: number): boolean {
    return probabilityOf(posterior, label) > threshold;
}
