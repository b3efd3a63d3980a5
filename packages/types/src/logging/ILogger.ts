/**
 * Structured logging contract shared by the normalizer core and the services
 * around it.
 *
 * The normalizer never reaches for a module-level logger: callers hand it an
 * `ILogger` so that diagnostics (unknown block types, missing payload fields,
 * initiating accounts outside the account set) can be asserted in tests and
 * scoped per trace in production. Implementations wrap Pino; the methods mirror
 * Pino's `(bindings, message)` calling convention.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry for failures that stop the process.
     *
     * @param args - Structured payloads or message strings describing the failure
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     *
     * Used for recoverable failures that still need attention, such as a trace
     * whose wire payload could not be decoded.
     *
     * @param args - Structured payloads or message strings describing the error
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry.
     *
     * Unrecognized block types and blocks missing an expected field are reported
     * here; processing continues after the call.
     *
     * @param args - Structured payloads or message strings capturing the warning
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Emit an info-level log entry.
     *
     * @param args - Structured payloads or message strings summarizing the event
     */
    info(...args: readonly unknown[]): void;

    /**
     * Emit a debug-level log entry.
     *
     * @param args - Structured payloads or message strings with diagnostic context
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Emit a trace-level log entry.
     *
     * @param args - Structured payloads or message strings describing the traced step
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * Child loggers attach consistent metadata, such as the module name or the
     * trace id being normalized, to every entry they emit.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @param options - Optional logger-specific configuration such as level overrides
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
