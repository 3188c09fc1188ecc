/**
 * Structured logging contract shared across backend services.
 *
 * Mirrors the Pino method surface so a Pino instance (or a child of one) can be
 * handed to any service directly, while tests substitute a recording double.
 * Callers use Pino's `(bindings, message)` argument order throughout.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry.
     *
     * @param args - Structured payloads or message strings describing the failure
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     *
     * @param args - Structured payloads or message strings describing the error condition
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry.
     *
     * Synchronization passes use warnings for per-item failures that are skipped
     * without aborting the pass (unreadable entries, invalid manifests, failed writes).
     *
     * @param args - Structured payloads or message strings capturing the warning details
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
     * @param args - Structured payloads or message strings describing the traced action
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @param options - Optional logger-specific configuration such as level overrides
     * @returns A logger that inherits from the current instance while applying the bindings
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
