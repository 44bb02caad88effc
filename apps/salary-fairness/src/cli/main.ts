/**
 * @fileoverview Command Line
 *
 * Trains the salary network on one CSV, evaluates the fairness
 * statistics on another, and prints the six percentages.
 *
 * Settings come from, in increasing precedence: built-in defaults, the
 * environment (TRAIN_CSV, TEST_CSV, ANALYSIS_CONFIG, LOG_LEVEL), and
 * command line flags.
 *
 * @module cli/main
 */

import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import {
    buildNaiveBayes,
    type BayesNetwork,
    type InferenceLogger,
} from "@bayesfair/engine";
import { loadDataset } from "../adapters/csv/index.js";
import { loadAnalysisConfigWithFallback, type AnalysisConfig } from "../config/index.js";
import {
    describeQuestion,
    runFairnessAnalysis,
    type FairnessReport,
} from "../domain/index.js";
import { createConsoleLogger, parseLogLevel } from "../logger.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const kAPP_ROOT = join(__dirname, "..", "..");

/**
 * Resolved run settings.
 */
export interface CliOptions {
    /** Training CSV */
    readonly trainPath: string;

    /** Test CSV */
    readonly testPath: string;

    /** Analysis YAML */
    readonly configPath: string;

    /** Force smoothing off regardless of the config */
    readonly noSmoothing: boolean;

    /** Print usage and exit */
    readonly help: boolean;
}

export const USAGE = `Usage: salary-fairness [options]

Options:
  --train <csv>     Training data (default: data/adult-train_tiny.csv)
  --test <csv>      Test data (default: data/adult-test_tiny.csv)
  --config <yml>    Analysis settings (default: config/analysis.yml)
  --no-smoothing    Build CPTs from raw frequencies
  --help            Show this message`;

/**
 * Parse command line arguments over environment defaults.
 *
 * @param argv - Arguments after the script name
 * @param env - Environment variables
 * @returns Resolved options (paths are absolute)
 * @throws Error for unknown flags or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CliOptions {
    let trainPath = env.TRAIN_CSV ?? join(kAPP_ROOT, "data", "adult-train_tiny.csv");
    let testPath = env.TEST_CSV ?? join(kAPP_ROOT, "data", "adult-test_tiny.csv");
    let configPath = env.ANALYSIS_CONFIG ?? join(kAPP_ROOT, "config", "analysis.yml");
    let noSmoothing = false;
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const value = () => {
            const next = argv[i + 1];
            if (next === undefined || next.startsWith("--")) {
                throw new Error(`Missing value for ${arg}`);
            }
            i++;
            return next;
        };

        switch (arg) {
            case "--train":
                trainPath = value();
                break;
            case "--test":
                testPath = value();
                break;
            case "--config":
                configPath = value();
                break;
            case "--no-smoothing":
                noSmoothing = true;
                break;
            case "--help":
            case "-h":
                help = true;
                break;
            default:
                throw new Error(`Unknown option: ${arg}`);
        }
    }

    return {
        trainPath : resolve(trainPath),
        testPath  : resolve(testPath),
        configPath: resolve(configPath),
        noSmoothing,
        help,
    };
}

/**
 * Result of a full run.
 */
export interface AnalysisRun {
    readonly config: AnalysisConfig;
    readonly network: BayesNetwork;
    readonly report: FairnessReport;
}

/**
 * Load settings and data, train, and evaluate.
 */
export function runAnalysis(options: CliOptions, logger: InferenceLogger): AnalysisRun {
    const config = loadAnalysisConfigWithFallback(options.configPath, logger);

    const training = loadDataset(options.trainPath);
    logger.info("Training data loaded", { path: options.trainPath, rows: training.rows.length });

    const network = buildNaiveBayes(training.rows, config.classAttribute, {
        smoothing: options.noSmoothing ? 0 : config.smoothing,
        domains  : config.domains,
        logger,
    });

    const test = loadDataset(options.testPath);
    logger.info("Test data loaded", { path: options.testPath, rows: test.rows.length });

    const report = runFairnessAnalysis(network, test.rows, config, { logger });
    return { config, network, report };
}

/**
 * Render the report, one `Qn: xx.xx%` line per question.
 */
export function formatReport(report: FairnessReport, config: AnalysisConfig): string {
    return report.metrics
        .map((metric) =>
            `  Q${metric.question}: ${metric.percentage.toFixed(2)}%  ${describeQuestion(metric.question, config)}`
        )
        .join("\n");
}

/**
 * Entry point.
 *
 * @param argv - Arguments after the script name
 * @param env - Environment variables
 * @returns Process exit code
 */
export function main(argv: readonly string[], env: NodeJS.ProcessEnv): number {
    const logger = createConsoleLogger(parseLogLevel(env.LOG_LEVEL));

    try {
        const options = parseCliArgs(argv, env);
        if (options.help) {
            console.log(USAGE);
            return 0;
        }

        const { config, report } = runAnalysis(options, logger);
        console.log("Fairness metrics:");
        console.log(formatReport(report, config));
        return 0;
    }
    catch (error) {
        logger.error("[FATAL] Analysis failed", {
            error: error instanceof Error ? error.message : String(error),
        });
        return 1;
    }
}
