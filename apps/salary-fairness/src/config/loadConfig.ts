/**
 * @fileoverview Analysis Configuration Loader
 *
 * Loads the fairness analysis settings (class attribute, evidence
 * attributes, sensitive groups, declared domains) from a YAML file.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { InferenceLogger } from "@bayesfair/engine";

/**
 * One group of the sensitive attribute, e.g. `{ label: "women", value: "Female" }`.
 */
export interface SensitiveGroup {
    /** Name used in reports */
    readonly label: string;

    /** Value of the sensitive attribute that selects the group */
    readonly value: string;
}

/**
 * Fairness analysis settings.
 */
export interface AnalysisConfig {
    /** Column holding the class label */
    readonly classAttribute: string;

    /** Class label counted as a positive prediction */
    readonly positiveLabel: string;

    /** Positive when P(positiveLabel | evidence) is strictly above this */
    readonly threshold: number;

    /** Pseudo-count for the naive Bayes CPTs */
    readonly smoothing: number;

    /** Attributes conditioned on for every prediction */
    readonly evidence: readonly string[];

    /** Attribute compared across groups, and its two groups */
    readonly sensitive: {
        readonly attribute: string;
        readonly groups: readonly [SensitiveGroup, SensitiveGroup];
    };

    /** Declared domains by attribute */
    readonly domains: Readonly<Record<string, readonly string[]>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
    const value = source[key];
    if (typeof value !== "string" || value === "") {
        throw new Error(`Invalid analysis config: ${where}.${key} must be a non-empty string`);
    }
    return value;
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
        throw new Error(`Invalid analysis config: ${key} must be a non-negative number`);
    }
    return value;
}

function readStringList(value: unknown, where: string): string[] {
    if (!Array.isArray(value) || value.length === 0) {
        throw new Error(`Invalid analysis config: ${where} must be a non-empty list`);
    }

    return value.map((item, index) => {
        // YAML reads bare numbers and booleans as such; domain labels are strings
        if (typeof item === "string") {
            return item;
        }
        if (typeof item === "number" || typeof item === "boolean") {
            return String(item);
        }
        throw new Error(`Invalid analysis config: ${where}[${index}] must be a string`);
    });
}

function readGroup(value: unknown, index: number): SensitiveGroup {
    if (!isRecord(value)) {
        throw new Error(`Invalid analysis config: sensitive.groups[${index}] must be a mapping`);
    }
    return {
        label: readString(value, "label", `sensitive.groups[${index}]`),
        value: readString(value, "value", `sensitive.groups[${index}]`),
    };
}

/**
 * Validate a parsed YAML document as an AnalysisConfig.
 *
 * @param document - Result of parsing the YAML file
 * @returns The validated configuration
 * @throws Error describing the first invalid field
 */
export function parseAnalysisConfig(document: unknown): AnalysisConfig {
    if (!isRecord(document)) {
        throw new Error("Invalid analysis config: expected a mapping at the top level");
    }

    const sensitive = document.sensitive;
    if (!isRecord(sensitive)) {
        throw new Error("Invalid analysis config: sensitive must be a mapping");
    }

    const groups = sensitive.groups;
    if (!Array.isArray(groups) || groups.length !== 2) {
        throw new Error("Invalid analysis config: sensitive.groups must list exactly two groups");
    }

    const domains: Record<string, readonly string[]> = {};
    if (document.domains !== undefined) {
        if (!isRecord(document.domains)) {
            throw new Error("Invalid analysis config: domains must be a mapping");
        }
        for (const [attribute, labels] of Object.entries(document.domains)) {
            domains[attribute] = readStringList(labels, `domains.${attribute}`);
        }
    }

    return {
        classAttribute: readString(document, "classAttribute", "config"),
        positiveLabel : readString(document, "positiveLabel", "config"),
        threshold     : readNumber(document, "threshold", 0.5),
        smoothing     : readNumber(document, "smoothing", 1),
        evidence      : readStringList(document.evidence, "evidence"),
        sensitive     : {
            attribute: readString(sensitive, "attribute", "sensitive"),
            groups   : [readGroup(groups[0], 0), readGroup(groups[1], 1)],
        },
        domains,
    };
}

/**
 * Load the analysis configuration from a YAML file.
 *
 * @param filePath - Path to the YAML file
 * @returns The validated configuration
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadAnalysisConfig("./config/analysis.yml");
 * config.sensitive.groups[0]; // { label: "women", value: "Female" }
 * ```
 */
export function loadAnalysisConfig(filePath: string): AnalysisConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Analysis config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseAnalysisConfig(parseYaml(content));
}

/**
 * Load the analysis configuration, falling back to the built-in defaults.
 *
 * @param filePath - Path to the YAML file
 * @param logger - Receives a warning when the fallback is used
 */
export function loadAnalysisConfigWithFallback(filePath: string, logger: InferenceLogger): AnalysisConfig {
    try {
        return loadAnalysisConfig(filePath);
    }
    catch (error) {
        logger.warn("Failed to load analysis config, using defaults", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultAnalysisConfig();
    }
}

/**
 * Built-in configuration for the UCI Adult salary data.
 */
export function getDefaultAnalysisConfig(): AnalysisConfig {
    return {
        classAttribute: "Salary",
        positiveLabel : ">=50K",
        threshold     : 0.5,
        smoothing     : 1,
        evidence      : ["Work", "Education", "Occupation", "Relationship"],
        sensitive     : {
            attribute: "Gender",
            groups   : [
                { label: "women", value: "Female" },
                { label: "men", value: "Male" },
            ],
        },
        domains: {
            Work         : ["Not Working", "Government", "Private", "Self-emp"],
            Education    : ["<Gr12", "HS-Graduate", "Associate", "Professional", "Bachelors", "Masters", "Doctorate"],
            Occupation   : ["Admin", "Military", "Manual Labour", "Office Labour", "Service", "Professional"],
            MaritalStatus: ["Not-Married", "Married", "Separated", "Widowed"],
            Relationship : ["Wife", "Own-child", "Husband", "Not-in-family", "Other-relative", "Unmarried"],
            Race         : ["White", "Black", "Asian-Pac-Islander", "Amer-Indian-Eskimo", "Other"],
            Gender       : ["Male", "Female"],
            Country      : ["North-America", "South-America", "Europe", "Asia", "Middle-East", "Carribean"],
            Salary       : ["<50K", ">=50K"],
        },
    };
}
