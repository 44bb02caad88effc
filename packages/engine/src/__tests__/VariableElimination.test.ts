/**
 * @fileoverview Unit tests for variable elimination and prediction
 *
 * Tests cover:
 * - Prior-only and evidence-conditioned posteriors
 * - Zero-probability evidence with and without smoothing
 * - Elimination-order invariance
 * - Query and evidence validation
 * - Prediction tie-break and classification output
 * - VariableEliminationEngine caching and rebuild
 *
 * @module @bayesfair/engine/__tests__/VariableElimination
 */

import { describe, it, expect, vi } from "vitest";
import { buildNaiveBayes, type TrainingRow } from "../builder/NaiveBayesBuilder.js";
import { createBayesNetwork } from "../contracts/BayesNetwork.js";
import { createFactor } from "../contracts/Factor.js";
import { createVariable } from "../contracts/Variable.js";
import {
    DegenerateDistributionError,
    InvalidEvidenceError,
    InvalidVariableError,
    UnknownVariableError,
} from "../contracts/errors.js";
import { probabilityOf } from "../contracts/Posterior.js";
import {
    infer,
    inferFactor,
    VariableEliminationEngine,
} from "../inference/VariableElimination.js";
import { argmax, classify, predict, probabilityAbove } from "../inference/predict.js";

const SMALL_ROWS: TrainingRow[] = [
    { Work: "Private", Salary: "<50K" },
    { Work: "Private", Salary: ">=50K" },
    { Work: "Self", Salary: "<50K" },
];

const CENSUS_ROWS: TrainingRow[] = [
    { Work: "Private", Education: "HS", Gender: "Male", Salary: "<50K" },
    { Work: "Private", Education: "Bachelors", Gender: "Female", Salary: ">=50K" },
    { Work: "Self", Education: "Bachelors", Gender: "Male", Salary: ">=50K" },
    { Work: "Government", Education: "HS", Gender: "Female", Salary: "<50K" },
    { Work: "Private", Education: "Masters", Gender: "Male", Salary: ">=50K" },
    { Work: "Self", Education: "HS", Gender: "Female", Salary: "<50K" },
];

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Class C with prior (0.4, 0.6) and one attribute A chosen so that
 * observing A = "a1" makes both classes exactly equally likely.
 */
function createTiedNetwork(domain: readonly string[]) {
    const c = createVariable("C", domain);
    const a = createVariable("A", ["a0", "a1"]);
    // [A, C]: P(a0|c0)=0.4 P(a0|c1)=0.6 P(a1|c0)=0.6 P(a1|c1)=0.4
    return createBayesNetwork({
        name         : "tied",
        variables    : [c, a],
        factors      : [
            createFactor("C", [c], [0.4, 0.6]),
            createFactor("A,C", [a, c], [0.4, 0.6, 0.6, 0.4]),
        ],
        classVariable: c,
    });
}

describe("infer", () => {
    describe("posteriors", () => {
        // Scenario: No evidence returns the class prior
        it("should return the prior when there is no evidence", () => {
            const bn = buildNaiveBayes(SMALL_ROWS, "Salary");
            const posterior = infer(bn, "Salary", {});

            expect(Object.keys(posterior.probabilities)).toEqual(["<50K", ">=50K"]);
            expect(posterior.probabilities["<50K"]).toBeCloseTo(2 / 3, 12);
            expect(posterior.probabilities[">=50K"]).toBeCloseTo(1 / 3, 12);
            expect(posterior.probabilities["<50K"]).toBeGreaterThan(posterior.probabilities[">=50K"]);
        });

        // Scenario: Evidence shifts the posterior away from the prior
        it("should condition on observed evidence", () => {
            const bn = buildNaiveBayes(SMALL_ROWS, "Salary");
            const prior = infer(bn, "Salary");
            const self = infer(bn, "Salary", { Work: "Self" });
            const privateSector = infer(bn, "Salary", { Work: "Private" });

            // (2/3 * 1/2, 1/3 * 1/3) normalized
            expect(self.probabilities["<50K"]).toBeCloseTo(0.75, 12);
            expect(self.probabilities[">=50K"]).toBeCloseTo(0.25, 12);
            // (2/3 * 1/2, 1/3 * 2/3) normalized
            expect(privateSector.probabilities["<50K"]).toBeCloseTo(0.6, 12);
            expect(privateSector.probabilities[">=50K"]).toBeCloseTo(0.4, 12);
            expect(self.probabilities["<50K"]).not.toBeCloseTo(prior.probabilities["<50K"], 6);
        });

        // Scenario: Posterior factor has scope [query] and sums to 1
        it("should return a normalized factor over the query variable", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");
            const factor = inferFactor(bn, "Salary", { Gender: "Female", Education: "HS" });
            const total = factor.values.reduce((sum, v) => sum + v, 0);

            expect(factor.scope.map((v) => v.name)).toEqual(["Salary"]);
            expect(Math.abs(total - 1)).toBeLessThan(1e-9);
        });

        // Scenario: Non-class variables can be queried too
        it("should answer queries on attribute variables", () => {
            const bn = buildNaiveBayes(SMALL_ROWS, "Salary");
            const posterior = infer(bn, "Work", { Salary: ">=50K" });

            expect(posterior.probabilities.Private).toBeCloseTo(2 / 3, 12);
            expect(posterior.probabilities.Self).toBeCloseTo(1 / 3, 12);
        });

        // Scenario: Inference does not change the network
        it("should leave the network's CPTs untouched", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");
            const before = [...bn.factors.values()].map((f) => [...f.values]);

            infer(bn, "Salary", { Work: "Self", Gender: "Male" });

            expect([...bn.factors.values()].map((f) => [...f.values])).toEqual(before);
        });
    });

    describe("zero-probability evidence", () => {
        const domains = { Work: ["Private", "Self", "Unemployed"] };

        // Scenario: Unseen value without smoothing has zero mass
        it("should raise DegenerateDistributionError without smoothing", () => {
            const bn = buildNaiveBayes(SMALL_ROWS, "Salary", { smoothing: 0, domains });

            expect(() => infer(bn, "Salary", { Work: "Unemployed" })).toThrow(DegenerateDistributionError);
        });

        // Scenario: Same query succeeds once smoothed
        it("should return a valid distribution with smoothing", () => {
            const bn = buildNaiveBayes(SMALL_ROWS, "Salary", { domains });
            const posterior = infer(bn, "Salary", { Work: "Unemployed" });

            // (2/3 * 1/5, 1/3 * 1/4) normalized
            expect(posterior.probabilities["<50K"]).toBeCloseTo(8 / 13, 12);
            expect(posterior.probabilities[">=50K"]).toBeCloseTo(5 / 13, 12);
        });
    });

    describe("elimination order", () => {
        // Scenario: Any valid order yields the same posterior
        it("should not depend on the elimination order", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");

            const forward = inferFactor(bn, "Work", { Gender: "Female" }, {
                eliminationOrder: ["Salary", "Education"],
            });
            const backward = inferFactor(bn, "Work", { Gender: "Female" }, {
                eliminationOrder: ["Education", "Salary"],
            });
            const defaulted = inferFactor(bn, "Work", { Gender: "Female" });

            forward.values.forEach((value, i) => {
                expect(backward.values[i]).toBeCloseTo(value, 12);
                expect(defaulted.values[i]).toBeCloseTo(value, 12);
            });
        });

        // Scenario: Orders over several hidden attributes
        it("should agree across all orders of the hidden attributes", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");
            const orders = [
                ["Work", "Education", "Gender"],
                ["Gender", "Work", "Education"],
                ["Education", "Gender", "Work"],
            ];

            const results = orders.map((eliminationOrder) =>
                inferFactor(bn, "Salary", {}, { eliminationOrder }).values
            );

            for (const values of results.slice(1)) {
                values.forEach((value, i) => expect(value).toBeCloseTo(results[0][i], 12));
            }
        });

        // Scenario: Orders must list exactly the hidden variables
        it("should reject an order that misses or adds variables", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");

            expect(() =>
                inferFactor(bn, "Salary", { Work: "Self" }, { eliminationOrder: ["Education"] })
            ).toThrow(InvalidVariableError);
            expect(() =>
                inferFactor(bn, "Salary", { Work: "Self" }, { eliminationOrder: ["Education", "Gender", "Work"] })
            ).toThrow(InvalidVariableError);
        });

        // Scenario: One debug entry per eliminated variable
        it("should log each elimination step", () => {
            const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");
            const logger = createMockLogger();

            infer(bn, "Salary", { Work: "Private" }, { logger });

            expect(logger.debug).toHaveBeenCalledTimes(2);
            expect(logger.debug).toHaveBeenNthCalledWith(1, "Eliminated variable", {
                variable: "Education",
                joined  : 1,
                size    : 2,
            });
        });
    });

    describe("validation", () => {
        const bn = buildNaiveBayes(SMALL_ROWS, "Salary");

        // Scenario: Unknown query variable
        it("should throw UnknownVariableError for an unknown query", () => {
            expect(() => infer(bn, "Age", {})).toThrow(UnknownVariableError);
        });

        // Scenario: Evidence must not assign the query
        it("should reject evidence on the query variable", () => {
            expect(() => infer(bn, "Salary", { Salary: "<50K" })).toThrow(InvalidEvidenceError);
        });

        // Scenario: Unknown evidence names and labels
        it("should reject unknown evidence names and out-of-domain labels", () => {
            expect(() => infer(bn, "Salary", { Country: "Europe" })).toThrow(
                'Evidence names unknown variable "Country"'
            );
            expect(() => infer(bn, "Salary", { Work: "Retired" })).toThrow(InvalidEvidenceError);
        });
    });
});

describe("predict", () => {
    // Scenario: Highest posterior wins
    it("should predict the most probable class", () => {
        const bn = buildNaiveBayes(SMALL_ROWS, "Salary");

        expect(predict(bn, { Work: "Self" })).toBe("<50K");
    });

    // Scenario: Exact tie resolves to the first outcome in domain order
    it("should break ties by domain order", () => {
        const yesFirst = createTiedNetwork(["yes", "no"]);
        const noFirst = createTiedNetwork(["no", "yes"]);

        const posterior = infer(yesFirst, "C", { A: "a1" });
        expect(posterior.probabilities.yes).toBe(posterior.probabilities.no);

        expect(predict(yesFirst, { A: "a1" })).toBe("yes");
        expect(predict(noFirst, { A: "a1" })).toBe("no");
    });

    // Scenario: argmax on an explicit posterior
    it("should pick the later outcome only when strictly larger", () => {
        const bn = createTiedNetwork(["yes", "no"]);

        expect(argmax(infer(bn, "C", {}))).toBe("no");
        expect(argmax(infer(bn, "C", { A: "a0" }))).toBe("no");
    });

    // Scenario: Query another variable
    it("should predict a non-class variable when asked", () => {
        const bn = buildNaiveBayes(SMALL_ROWS, "Salary");

        expect(predict(bn, { Salary: ">=50K" }, { query: "Work" })).toBe("Private");
    });
});

describe("classify", () => {
    // Scenario: Output carries the label, its mass and the evidence used
    it("should return a frozen classification output", () => {
        const bn = buildNaiveBayes(SMALL_ROWS, "Salary");
        const output = classify(bn, { Work: "Self" });

        expect(output.type).toBe("<50K");
        expect(output.confidence).toBeCloseTo(0.75, 12);
        expect(output.tags).toEqual(["Work"]);
        expect(Object.isFrozen(output)).toBe(true);
    });

    // Scenario: No evidence classifies from the prior
    it("should report the prior mass and no tags without evidence", () => {
        const output = classify(buildNaiveBayes(SMALL_ROWS, "Salary"), {});

        expect(output.type).toBe("<50K");
        expect(output.confidence).toBeCloseTo(2 / 3, 12);
        expect(output.tags).toEqual([]);
    });
});

describe("probabilityAbove", () => {
    // Scenario: Strictly-greater decision boundary
    it("should compare against the threshold strictly", () => {
        const bn = createTiedNetwork(["yes", "no"]);
        const tied = infer(bn, "C", { A: "a1" });

        expect(probabilityOf(tied, "yes")).toBeCloseTo(0.5, 12);
        expect(probabilityAbove(tied, "yes", 0.4)).toBe(true);
        expect(probabilityAbove(tied, "yes", 0.9)).toBe(false);
        expect(() => probabilityAbove(tied, "maybe", 0.5)).toThrow(InvalidEvidenceError);
    });
});

describe("VariableEliminationEngine", () => {
    // Scenario: Cached posteriors are reused regardless of evidence key order
    it("should memoize posteriors per query and evidence", () => {
        const bn = buildNaiveBayes(CENSUS_ROWS, "Salary");
        const engine = new VariableEliminationEngine(bn, { cache: true });

        const first = engine.posterior("Salary", { Work: "Self", Gender: "Male" });
        const second = engine.posterior("Salary", { Gender: "Male", Work: "Self" });

        expect(second).toBe(first);
        expect(engine.cachedCount).toBe(1);

        engine.posterior("Salary", { Work: "Self" });
        expect(engine.cachedCount).toBe(2);
    });

    // Scenario: Without caching every call recomputes
    it("should not cache when caching is off", () => {
        const engine = new VariableEliminationEngine(buildNaiveBayes(SMALL_ROWS, "Salary"));

        const first = engine.posterior("Salary", { Work: "Self" });
        const second = engine.posterior("Salary", { Work: "Self" });

        expect(second).not.toBe(first);
        expect(second).toEqual(first);
        expect(engine.cachedCount).toBe(0);
    });

    // Scenario: Rebuilding swaps the network and drops cached results
    it("should invalidate the cache on rebuild", () => {
        const logger = createMockLogger();
        const engine = new VariableEliminationEngine(buildNaiveBayes(SMALL_ROWS, "Salary"), {
            cache: true,
            logger,
        });
        engine.posterior("Salary", { Work: "Self" });

        const retrained = buildNaiveBayes(CENSUS_ROWS, "Salary", { name: "retrained" });
        engine.rebuild(retrained);

        expect(engine.cachedCount).toBe(0);
        expect(engine.network).toBe(retrained);
        expect(logger.info).toHaveBeenCalledWith("Network replaced", { network: "retrained" });
        expect(engine.posterior("Salary", { Work: "Self" }).probabilities["<50K"]).toBeCloseTo(
            infer(retrained, "Salary", { Work: "Self" }).probabilities["<50K"],
            12
        );
    });
});
