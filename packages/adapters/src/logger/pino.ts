import { type LogLevel, type Logger } from '@worksheetbot/core';
import pino, { type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
}

function createPino(options: PinoLoggerOptions): PinoInstance {
    const { level = 'info', prettyPrint = false, name } = options;

    const pinoOptions: pino.LoggerOptions = { level };

    if (name) {
        pinoOptions.name = name;
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
    }

    return pino(pinoOptions);
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    public constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = 'child' in options ? options : createPino(options);
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }

    private write(level: LogLevel, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[level](arg1);
        } else {
            this.pino[level](arg1, arg2);
        }
    }
}
