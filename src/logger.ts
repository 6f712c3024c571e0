import chalk, { type ChalkFunction } from 'chalk';
import { inspect } from 'util';

export const LOG_LEVELS = [ 'silent', 'error', 'warning', 'info' ] as const;

export type LogLevel = typeof LOG_LEVELS[number];

type Severity = Exclude<LogLevel, 'silent'>;

export class Logger {
    protected static _chalk: chalk.Chalk = new chalk.Instance({ level: 1 });
    private static _level: LogLevel = 'info';

    private readonly _location_value: string;

    protected get _location(): string {
        return this._location_value;
    }

    protected _previousLocations: string[];

    protected get _fullLocation(): string[] {
        return this._previousLocations.concat(this._location);
    }

    constructor(location: string, previousLocations: string[] = []) {
        this._location_value = location;
        this._previousLocations = previousLocations;
    }

    public static get level(): LogLevel {
        return Logger._level;
    }

    public static setLevel(level: LogLevel): void {
        Logger._level = level;
    }

    public static makeUnderline(message: string): string {
        return Logger._chalk.underline(message);
    }

    public createChild(location: string): Logger {
        return new Logger(location, this._fullLocation);
    }

    public createCounter(max: number): LoggerCounter {
        return new LoggerCounter(this._fullLocation, max);
    }

    public log(...messages: unknown[]): void {
        Logger._log('info', this._fullLocation, messages);
    }

    public error(...messages: unknown[]): void {
        Logger._log('error', this._fullLocation, messages, Logger._chalk.redBright);
    }

    public happy(...messages: unknown[]): void {
        Logger._log('info', this._fullLocation, messages, Logger._chalk.greenBright);
    }

    public warning(...messages: unknown[]): void {
        Logger._log('warning', this._fullLocation, messages, Logger._chalk.yellow);
    }

    protected static _log(severity: Severity, locations: string[], messages: unknown[], colorFn?: ChalkFunction): void {
        if (LOG_LEVELS.indexOf(severity) > LOG_LEVELS.indexOf(Logger._level)) return;

        const _messages = messages.map((m) => {
            let msg = typeof m === 'object' ? inspect(m, { depth: 2 }) : String(m);

            if (colorFn) {
                msg = colorFn(msg);
            }

            return msg;
        });

        const _location = locations.reduce((acc, item) => acc + `[${ item }]`, '');
        const line = `${ _location }: ${ _messages.join(' ') }`;

        if (severity === 'error') console.error(line);
        else console.log(line);
    }
}

export class LoggerCounter extends Logger {
    private _count: number;
    private readonly _max: number;

    constructor(previousLocations: string[], max: number) {
        super('', previousLocations);

        this._count = 0;
        this._max = max;
    }

    // Every call advances the counter, one line per finished item.
    protected override get _location() {
        return `${ ++this._count }/${ this._max }`;
    }
}
