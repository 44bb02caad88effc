/**
 * @fileoverview Fairness Analysis
 *
 * Scores a trained network against labelled test rows and reports six
 * group-conditional statistics for the two groups of a sensitive
 * attribute (g1, g2):
 *
 * | Q | Notion             | Statistic                                                    |
 * |---|--------------------|--------------------------------------------------------------|
 * | 1 | demographic parity | % of g1 predicted positive                                   |
 * | 2 | demographic parity | % of g2 predicted positive                                   |
 * | 3 | separation         | % of g1 with P(pos \| E) > P(pos \| E, sensitive)            |
 * | 4 | separation         | % of g2 with P(pos \| E) > P(pos \| E, sensitive)            |
 * | 5 | sufficiency        | % of g1 predicted positive whose true class is positive      |
 * | 6 | sufficiency        | % of g2 predicted positive whose true class is positive      |
 *
 * "Predicted positive" means P(pos | E) is strictly above the configured
 * threshold. Separation only counts the one direction shown above.
 * A group with no rows (or, for Q5/Q6, no positive predictions) scores 0.
 *
 * @module domain/fairness/FairnessAnalysis
 */

import {
    probabilityAbove,
    probabilityOf,
    silentLogger,
    VariableEliminationEngine,
    type BayesNetwork,
    type Evidence,
    type InferenceLogger,
} from "@bayesfair/engine";
import type { DatasetRow } from "../../adapters/csv/index.js";
import type { AnalysisConfig, SensitiveGroup } from "../../config/index.js";

/**
 * Question number, 1 through 6.
 */
export type FairnessQuestion = 1 | 2 | 3 | 4 | 5 | 6;

export type FairnessNotion = "demographic parity" | "separation" | "sufficiency";

/**
 * One computed statistic.
 */
export interface FairnessMetric {
    readonly question: FairnessQuestion;
    readonly notion: FairnessNotion;

    /** Group the statistic is about */
    readonly group: SensitiveGroup;

    /** Rows counted in the numerator */
    readonly count: number;

    /** Rows in the denominator */
    readonly total: number;

    /** 100 * count / total, or 0 when total is 0 */
    readonly percentage: number;
}

/**
 * All six statistics, in question order.
 */
export interface FairnessReport {
    readonly metrics: readonly FairnessMetric[];

    /** Number of test rows evaluated */
    readonly rowsEvaluated: number;
}

/**
 * Options for {@link runFairnessAnalysis}.
 */
export interface FairnessOptions {
    readonly logger?: InferenceLogger;
}

/**
 * Per-row quantities the statistics are built from.
 */
interface RowScore {
    readonly group: 0 | 1 | null;
    readonly predictedPositive: boolean;
    readonly moreLikelyWithoutSensitive: boolean;
    readonly actuallyPositive: boolean;
}

function percentage(count: number, total: number): number {
    return total === 0 ? 0 : (100 * count) / total;
}

function evidenceFor(row: DatasetRow, attributes: readonly string[], index: number): Evidence {
    const evidence: Record<string, string> = {};
    for (const attribute of attributes) {
        const value = row[attribute];
        if (value === undefined) {
            throw new Error(`Test row ${index} has no value for "${attribute}"`);
        }
        evidence[attribute] = value;
    }
    return evidence;
}

/**
 * Evaluate the six fairness statistics.
 *
 * @param network - Trained naive Bayes network
 * @param rows - Labelled test rows
 * @param config - Class, evidence and sensitive-group settings
 * @param options - Logger
 * @returns Report with one metric per question
 * @throws Error if a row lacks an evidence, sensitive or class attribute
 * @throws InferenceError from the engine for labels outside the model's domains
 */
export function runFairnessAnalysis(
    network: BayesNetwork,
    rows: readonly DatasetRow[],
    config: AnalysisConfig,
    options: FairnessOptions = {}
): FairnessReport {
    const logger = options.logger ?? silentLogger;
    const engine = new VariableEliminationEngine(network, { cache: true });
    const { attribute, groups } = config.sensitive;
    const query = config.classAttribute;

    const scores: RowScore[] = rows.map((row, index) => {
        const evidence = evidenceFor(row, config.evidence, index);
        const withSensitive = evidenceFor(row, [...config.evidence, attribute], index);
        const truth = evidenceFor(row, [query], index)[query];

        const base = engine.posterior(query, evidence);
        const conditioned = engine.posterior(query, withSensitive);

        const groupIndex = groups.findIndex((group) => group.value === row[attribute]);

        return {
            group                     : groupIndex === 0 || groupIndex === 1 ? groupIndex : null,
            predictedPositive         : probabilityAbove(base, config.positiveLabel, config.threshold),
            moreLikelyWithoutSensitive:
                probabilityOf(base, config.positiveLabel) > probabilityOf(conditioned, config.positiveLabel),
            actuallyPositive          : truth === config.positiveLabel,
        };
    });

    const metrics: FairnessMetric[] = [];
    const metric = (
        question: FairnessQuestion,
        notion: FairnessNotion,
        group: 0 | 1,
        count: number,
        total: number
    ) => {
        metrics.push({
            question,
            notion,
            group     : groups[group],
            count,
            total,
            percentage: percentage(count, total),
        });
    };

    const members = ([0, 1] as const).map((group) => scores.filter((score) => score.group === group));

    ([0, 1] as const).forEach((group) => {
        const inGroup = members[group];
        metric(
            group === 0 ? 1 : 2,
            "demographic parity",
            group,
            inGroup.filter((score) => score.predictedPositive).length,
            inGroup.length
        );
    });

    ([0, 1] as const).forEach((group) => {
        const inGroup = members[group];
        metric(
            group === 0 ? 3 : 4,
            "separation",
            group,
            inGroup.filter((score) => score.moreLikelyWithoutSensitive).length,
            inGroup.length
        );
    });

    ([0, 1] as const).forEach((group) => {
        const positives = members[group].filter((score) => score.predictedPositive);
        metric(
            group === 0 ? 5 : 6,
            "sufficiency",
            group,
            positives.filter((score) => score.actuallyPositive).length,
            positives.length
        );
    });

    logger.info("Fairness analysis complete", {
        rows           : rows.length,
        groupSizes     : Object.fromEntries(groups.map((group, i) => [group.label, members[i].length])),
        ungrouped      : scores.filter((score) => score.group === null).length,
        distinctQueries: engine.cachedCount,
    });

    return { metrics, rowsEvaluated: rows.length };
}

/**
 * The value reported for one question.
 *
 * @param report - Result of {@link runFairnessAnalysis}
 * @param question - Question number
 * @returns Percentage in [0, 100]
 * @throws RangeError if the question is not 1 through 6
 */
export function explore(report: FairnessReport, question: number): number {
    const found = report.metrics.find((metric) => metric.question === question);
    if (!found) {
        throw new RangeError(`Question must be 1-6, got ${question}`);
    }
    return found.percentage;
}

/**
 * Human-readable wording of a question.
 */
export function describeQuestion(question: FairnessQuestion, config: AnalysisConfig): string {
    const [first, second] = config.sensitive.groups;
    const group = question % 2 === 1 ? first : second;
    const positive = `${config.classAttribute} ${config.positiveLabel}`;
    const sensitive = config.sensitive.attribute;

    switch (question) {
        case 1:
        case 2:
            return `% of ${group.label} predicted ${positive} (demographic parity)`;
        case 3:
        case 4:
            return `% of ${group.label} with P(${positive} | E) > P(${positive} | E, ${sensitive}) (separation)`;
        case 5:
        case 6:
            return `% of ${group.label} predicted ${positive} who are ${positive} (sufficiency)`;
    }
}
