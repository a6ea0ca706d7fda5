/**
 * Progress goes to `log`, recoverable anomalies to `warn`.
 * Modules default to the console; tests pass a spy.
 */
export type Logger = Pick<Console, 'log' | 'warn'>;

export const defaultLogger: Logger = console;
