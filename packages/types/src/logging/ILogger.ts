/**
 * Structured logging contract shared across backend services.
 *
 * Services depend on this interface instead of importing Pino directly, so tests
 * can pass a stub and modules can hand out scoped child loggers. The Pino logger
 * created at bootstrap satisfies it as-is.
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;

    error(...args: readonly unknown[]): void;

    warn(...args: readonly unknown[]): void;

    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a child logger that adds the given bindings to every entry.
     *
     * @param bindings - Context fields such as `{ module: 'pages' }`
     */
    child(bindings: Record<string, unknown>): ILogger;
}
