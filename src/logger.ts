import { pino, type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

let rootLogger: Logger | undefined;

// Built on first use so variables loaded by dotenv after import still apply.
function root(): Logger {
    if (!rootLogger) {
        rootLogger = pino({
            level: process.env.LOG_LEVEL || 'info',
            base: undefined,
        });
    }
    return rootLogger;
}

export function createLogger(scope: string): Logger {
    return root().child({ scope });
}
