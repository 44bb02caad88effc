/**
 * Logger Contract
 *
 * The engine never writes to the console on its own. Components that
 * can report progress accept an {@link InferenceLogger} through their
 * options and default to {@link silentLogger}.
 */

/**
 * Logger interface for engine components.
 */
export interface InferenceLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: InferenceLogger = Object.freeze({
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
});
