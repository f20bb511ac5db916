import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export const contextStorage = new AsyncLocalStorage<Map<string, string>>();

const CONTEXT_KEYS = ['sessionId', 'url', 'corpusPath'] as const;

const logger = pino({
    name: 'masquerade',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    redact: {
        paths: [
            'authorization',
            'cookie',
            'headers.authorization',
            'headers.cookie',
            'headers["proxy-authorization"]',
            '*.authorization',
            '*.cookie'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Record<string, string> = {};

        // Session and URL correlation for every line logged inside a masked request
        if (store) {
            for (const key of CONTEXT_KEYS) {
                const value = store.get(key);
                if (value) {
                    context[key] = value;
                }
            }
        }

        return context;
    }
});

export default logger;
