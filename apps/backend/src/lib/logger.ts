import pino from 'pino';
import type { AppConfig } from '../config/env.js';

/**
 * Creates the application Pino logger.
 *
 * Outside production, output goes through `pino-pretty` for readable console
 * lines. Production writes newline-delimited JSON to stdout.
 *
 * **Log levels:**
 *
 * - Production: `info` and above
 * - Development: `debug` and above
 * - Test: `silent`
 *
 * Modules take a child logger (`logger.child({ module: 'pages' })`) so each line
 * carries its origin.
 *
 * @param config - Application configuration, only `nodeEnv` is read
 * @returns Configured Pino logger instance
 */
export function createLogger(config: Pick<AppConfig, 'nodeEnv'>): pino.Logger {
    const level = config.nodeEnv === 'production' ? 'info' : config.nodeEnv === 'test' ? 'silent' : 'debug';
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'keepsake-backend'
        }
    };

    if (config.nodeEnv === 'production') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}
