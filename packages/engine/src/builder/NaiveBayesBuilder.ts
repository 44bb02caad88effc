/**
 * @fileoverview Naive Bayes Network Builder
 *
 * Builds a BayesNetwork from labelled rows under the naive Bayes
 * assumption: the class variable has no parents, and every other
 * attribute has the class as its only parent.
 *
 * - Prior: `P(c) = count(c) / N`
 * - CPT:   `P(x | c) = (count(x, c) + k) / (count(c) + k * |dom(X)|)`
 *
 * `k` is the smoothing pseudo-count. The default `k = 1` (Laplace) keeps
 * every CPT entry positive, so evidence seen rarely or never in training
 * still yields a defined posterior. `k = 0` gives raw frequencies.
 *
 * @module @bayesfair/engine/builder/NaiveBayesBuilder
 */

import { createBayesNetwork, type BayesNetwork } from "../contracts/BayesNetwork.js";
import {
    EmptyDatasetError,
    InvalidDatasetError,
    MissingClassColumnError,
} from "../contracts/errors.js";
import { createFactor, type Factor } from "../contracts/Factor.js";
import { silentLogger, type InferenceLogger } from "../contracts/Logger.js";
import { createVariable, indexOfOutcome, type Variable } from "../contracts/Variable.js";

/**
 * A parsed training row: attribute name -> observed label.
 */
export type TrainingRow = Readonly<Record<string, string>>;

/**
 * Builder options.
 */
export interface NaiveBayesOptions {
    /** Smoothing pseudo-count per (x, c) cell (default: 1) */
    readonly smoothing?: number;

    /**
     * Declared domains by attribute. A declared domain fixes label order
     * and may include labels that never occur in the rows. Attributes
     * without one get the sorted set of observed labels.
     */
    readonly domains?: Readonly<Record<string, readonly string[]>>;

    /** Network name (default: "<class> Naive Bayes") */
    readonly name?: string;

    /** Logger for build progress */
    readonly logger?: InferenceLogger;
}

/**
 * Default smoothing pseudo-count (add-one).
 */
export const kDEFAULT_SMOOTHING = 1;

/**
 * Name given to the CPT of `attribute`, e.g. "Work,Salary".
 */
export function cptFactorName(attribute: string, classAttribute: string): string {
    return `${attribute},${classAttribute}`;
}

function observedDomain(rows: readonly TrainingRow[], attribute: string): string[] {
    const labels = new Set<string>();
    for (const row of rows) {
        labels.add(row[attribute]);
    }
    return [...labels].sort();
}

function buildVariable(
    rows: readonly TrainingRow[],
    attribute: string,
    declared: readonly string[] | undefined
): Variable {
    if (!declared) {
        return createVariable(attribute, observedDomain(rows, attribute));
    }

    const variable = createVariable(attribute, declared);
    rows.forEach((row, index) => {
        if (indexOfOutcome(variable, row[attribute]) < 0) {
            throw new InvalidDatasetError(
                `Row ${index} has "${row[attribute]}" for "${attribute}", which is outside its declared domain`
            );
        }
    });
    return variable;
}

/**
 * Build a naive Bayes network from labelled rows.
 *
 * Attributes are taken from the first row, and every other row must have
 * exactly the same ones. Variables are declared with the class first, then
 * the remaining attributes in first-row order.
 *
 * @param rows - Training rows, each mapping every attribute to a label
 * @param classAttribute - Name of the class column (e.g. "Salary")
 * @param options - Smoothing, declared domains, name and logger
 * @returns A network with one prior and one `[X, class]` CPT per attribute
 * @throws EmptyDatasetError if `rows` is empty
 * @throws MissingClassColumnError if any row lacks the class attribute
 * @throws InvalidDatasetError if a row lacks an attribute of the first row
 *         or has one the first row lacks, a label falls outside a declared
 *         domain, smoothing is negative, or smoothing is 0 and a declared
 *         class label never occurs
 *
 * @example
 * ```typescript
 * const bn = buildNaiveBayes(
 *     [
 *         { Work: "Private", Salary: "<50K" },
 *         { Work: "Self", Salary: ">=50K" },
 *     ],
 *     "Salary"
 * );
 * ```
 */
export function buildNaiveBayes(
    rows: readonly TrainingRow[],
    classAttribute: string,
    options: NaiveBayesOptions = {}
): BayesNetwork {
    const smoothing = options.smoothing ?? kDEFAULT_SMOOTHING;
    const logger = options.logger ?? silentLogger;

    if (rows.length === 0) {
        throw new EmptyDatasetError();
    }

    if (!Number.isFinite(smoothing) || smoothing < 0) {
        throw new InvalidDatasetError(`Smoothing must be a non-negative number, got ${smoothing}`);
    }

    rows.forEach((row, index) => {
        if (row[classAttribute] === undefined) {
            throw new MissingClassColumnError(classAttribute, index);
        }
    });

    const attributes = Object.keys(rows[0]).filter((name) => name !== classAttribute);
    rows.forEach((row, index) => {
        for (const attribute of attributes) {
            if (row[attribute] === undefined) {
                throw new InvalidDatasetError(`Row ${index} has no value for attribute "${attribute}"`);
            }
        }

        const extra = Object.keys(row).find((name) => name !== classAttribute && !attributes.includes(name));
        if (extra !== undefined) {
            throw new InvalidDatasetError(`Row ${index} has attribute "${extra}", which the first row lacks`);
        }
    });

    const classVariable = buildVariable(rows, classAttribute, options.domains?.[classAttribute]);
    const classSize = classVariable.domain.length;

    const classCounts = new Array<number>(classSize).fill(0);
    for (const row of rows) {
        classCounts[indexOfOutcome(classVariable, row[classAttribute])]++;
    }

    const unseenClass = classVariable.domain.find((_, c) => classCounts[c] === 0);
    if (smoothing === 0 && attributes.length > 0 && unseenClass !== undefined) {
        throw new InvalidDatasetError(
            `Class label "${unseenClass}" never occurs in the rows, so its CPT columns need smoothing above 0`
        );
    }

    const prior = createFactor(
        classAttribute,
        [classVariable],
        classCounts.map((count) => count / rows.length)
    );

    const variables: Variable[] = [classVariable];
    const factors: Factor[] = [prior];

    for (const attribute of attributes) {
        const variable = buildVariable(rows, attribute, options.domains?.[attribute]);
        const size = variable.domain.length;

        // counts[x * classSize + c], matching the [X, class] layout
        const counts = new Array<number>(size * classSize).fill(0);
        for (const row of rows) {
            const x = indexOfOutcome(variable, row[attribute]);
            const c = indexOfOutcome(classVariable, row[classAttribute]);
            counts[x * classSize + c]++;
        }

        const values = counts.map(
            (count, cell) => (count + smoothing) / (classCounts[cell % classSize] + smoothing * size)
        );

        variables.push(variable);
        factors.push(createFactor(cptFactorName(attribute, classAttribute), [variable, classVariable], values));
    }

    const network = createBayesNetwork({
        name: options.name ?? `${classAttribute} Naive Bayes`,
        variables,
        factors,
        classVariable,
    });

    logger.info("Naive Bayes network built", {
        rows      : rows.length,
        classes   : classVariable.domain,
        attributes: attributes.length,
        smoothing,
    });

    return network;
}
