import { z } from 'zod';
import logger from './logger.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Environment Validation Schema
 * Every variable is optional and falls back to the defaults below.
 * Invalid values fail fast with a ConfigurationError.
 */

// Helper validators
const positiveInt = z.coerce.number().int().positive();
const urlValidator = z.string().url();

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // ==========================================
    // Logging
    // ==========================================
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // ==========================================
    // Identity Corpus
    // ==========================================
    CORPUS_PATH: z.string().min(1).default('user-agent.json'),
    CORPUS_MAX_AGE_SECONDS: positiveInt.default(86400),
    CORPUS_SOURCE_URL: urlValidator.default('https://www.useragents.me/'),
    REFRESH_USER_AGENT: z.string().min(1).default('Updater Bot'),
    REFRESH_TIMEOUT_MS: positiveInt.default(15000),

    // ==========================================
    // Header Policy
    // ==========================================
    ACCEPT_LANGUAGE: z.string().min(1).default('en-US,en;q=0.9'),
    DO_NOT_TRACK: z.enum(['0', '1']).default('1'),

    // ==========================================
    // Transport
    // ==========================================
    REQUEST_ATTEMPTS: positiveInt.default(5),
});

// Infer TypeScript type from schema
export type Environment = z.infer<typeof EnvironmentSchema>;

// Validated environment singleton
let validatedEnv: Environment | null = null;

/**
 * Validate environment variables.
 * Throws a ConfigurationError listing every invalid variable.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
    const result = EnvironmentSchema.safeParse(source);

    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        issues.forEach((issue, index) => {
            logger.error({ issue }, `Environment validation failed (${index + 1}/${issues.length})`);
        });
        throw new ConfigurationError('Environment validation failed', { issues });
    }

    validatedEnv = result.data;
    validateBusinessRules(validatedEnv);

    logger.debug({ nodeEnv: validatedEnv.NODE_ENV, corpusPath: validatedEnv.CORPUS_PATH }, 'Environment validation passed');
    return validatedEnv;
}

/**
 * Additional business logic validation
 */
function validateBusinessRules(env: Environment): void {
    if (env.NODE_ENV === 'production' && (env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace')) {
        logger.warn('Verbose logging enabled in production. Identity strings will appear in logs.');
    }

    if (env.CORPUS_MAX_AGE_SECONDS < 3600) {
        logger.warn(
            { maxAgeSeconds: env.CORPUS_MAX_AGE_SECONDS },
            'Corpus max age is under an hour; the statistics source is refreshed far less often'
        );
    }
}

/**
 * Get the validated environment, validating process.env on first use.
 */
export function getEnv(): Environment {
    return validatedEnv ?? validateEnvironment();
}

/**
 * Drop the cached environment so the next getEnv() re-reads process.env.
 */
export function resetEnvironment(): void {
    validatedEnv = null;
}
