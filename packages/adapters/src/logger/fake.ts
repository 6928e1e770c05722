import { type LogLevel, type Logger } from '@worksheetbot/core';

export interface FakeLogEntry {
    level: LogLevel;
    obj?: Record<string, unknown>;
    msg?: string;
}

/**
 * Records every entry in memory. Children share the parent's buffer and merge
 * their bindings into each entry's `obj`.
 */
export class FakeLogger implements Logger {
    public constructor(
        public readonly logs: FakeLogEntry[] = [],
        private readonly bindings: Record<string, unknown> = {}
    ) { }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger(this.logs, { ...this.bindings, ...bindings });
    }

    public messages(level?: LogLevel): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .flatMap((entry) => (entry.msg === undefined ? [] : [entry.msg]));
    }

    private log(level: LogLevel, arg1: Record<string, unknown> | string, arg2?: string): void {
        const hasBindings = Object.keys(this.bindings).length > 0;
        const entry: FakeLogEntry = { level };

        if (typeof arg1 === 'string') {
            entry.msg = arg1;
            if (hasBindings) entry.obj = { ...this.bindings };
        } else {
            entry.obj = { ...this.bindings, ...arg1 };
            if (arg2 !== undefined) entry.msg = arg2;
        }

        this.logs.push(entry);
    }
}
