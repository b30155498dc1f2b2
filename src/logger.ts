import winston from 'winston';
import type { TransformableInfo } from 'logform';

function logFormatter(info: TransformableInfo): string {
    const elements: Array<string> = [];

    if (info.timestamp) {
        elements.push(`[${info.timestamp}]`);
    }

    const message: unknown = info.message;
    let strMessage = '';
    if (message) {
        if (typeof message === 'string') {
            strMessage = message;
        } else {
            try {
                strMessage = JSON.stringify(message);
            } catch (e) {
                strMessage = `<unStringifiable ${typeof message}> ${String(message)}`;
            }
        }
    }

    elements.push(info.level || 'unknown');
    elements.push(typeof info.stack === 'string' ? info.stack : strMessage);
    return elements.join(' ');
}

export const logLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function resolveLogLevel(tmpLogLevel?: string): string {
    if (tmpLogLevel && logLevels.includes(tmpLogLevel.toLowerCase())) {
        return tmpLogLevel.toLowerCase();
    }
    return 'info';
}

export const logger = winston.createLogger({
    level: resolveLogLevel(process.env.LOG_LEVEL),
    format: winston.format.json(),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.timestamp({
                    format: 'YYYY-MM-DD HH:mm:ss.SSS ZZ'
                }),
                winston.format.colorize(),
                winston.format.splat(),
                winston.format.simple(),
                winston.format.printf((info: TransformableInfo): string => logFormatter(info))
            ),
            handleExceptions: true
        })
    ]
});

logger.debug(`set logLevel to : ${logger.level}`);

export default logger;
