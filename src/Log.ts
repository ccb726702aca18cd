import winston, { format } from "winston";
import nodeUtil from "node:util";
import { LOG_LEVELS, LogLevel } from "./typings/Configs";

function createLogger(level: LogLevel): winston.Logger {
    const transform: winston.Logform.TransformFunction = (info) => {
        const args = info[Symbol.for('splat')];
        const {message: rawMessage} = info;
        // Combine all the args with util.format
        const message = Array.isArray(args)
            ? nodeUtil.format(rawMessage, ...args)
            : nodeUtil.format(rawMessage);
        return {
            ...info,
            message,
        };
    };

    const utilFormatter = format(transform);

    return winston.createLogger({
        level: level,
        format: format.combine(
            format.timestamp({format: 'YYYY-MM-DD HH:mm:ss.SSS'}),
            format.errors({stack: true}),
            utilFormatter(),
            format.printf(({timestamp, label, level, message, stack}) => {
                const text = `${ timestamp } ${ label || 'mc-profile' } ${ level } ${ message }`;
                return stack ? `${ text }\n${ stack }` : text;
            }),
        ),
        transports: [
            new winston.transports.Console()
        ],
    });
}

function levelFromEnv(): LogLevel {
    const level = process.env.MC_PROFILE_LOG_LEVEL;
    return LOG_LEVELS.find(l => l === level) || "info";
}

export class Log {

    private static _logger?: winston.Logger;

    static get l(): winston.Logger {
        if (this._logger) {
            return this._logger;
        }
        this._logger = createLogger(levelFromEnv());
        return this._logger;
    }

    /**
     * A new console logger with the default format. Nothing else shares it, so its level can be changed freely.
     */
    static create(level: LogLevel): winston.Logger {
        return createLogger(level);
    }

    static setLogger(logger: winston.Logger) {
        this._logger = logger;
    }

}
