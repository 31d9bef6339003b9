import { createLogger, format, Logger, transports as winstonTransports } from 'winston';

const transports = [
    new (winstonTransports.Console)()
]

export type LogLevel = 'info' | 'debug' | 'warn' | 'error';

const VALID_LOG_LEVELS: LogLevel[] = [ 'info', 'debug', 'warn', 'error' ];

let LOG_LEVEL: LogLevel = "info";

export function isLogLevel(level: string): level is LogLevel {
    return VALID_LOG_LEVELS.some(validLevel => validLevel === level);
}

export function setLogLevel(level: string) {
    LOG_LEVEL = isLogLevel(level) ? level : "info";
    if(Log.created) {
        getLogger().level = LOG_LEVEL;
    }
}

class Log {
    private static _logger: Logger | undefined;

    private static create(level: LogLevel): Logger {
        this._logger = createLogger({
            format: format.combine(
                format.splat(),
                format.timestamp({
                    format: 'YYYY-MM-DD HH:mm:ss'
                }),
                format.printf(info => `${ info.timestamp } [${ info.level.toUpperCase() }] ${ info.message }`)
            ),
            level,
            transports,
            exitOnError: false,
        });
        this._logger.log("debug", "Log Level: %s", level)
        return this._logger;
    }

    static get created(): boolean {
        return this._logger !== undefined;
    }

    static get logger(): Logger {
        return this._logger || this.create(LOG_LEVEL);
    }
}

export function getLogger() {
    return Log.logger;
}
