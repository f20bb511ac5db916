/**
 * Error hierarchy for the identity emulation engine and its transport glue.
 * Typed errors with retry hints, context, and classification.
 */

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    TRANSIENT = 'transient',        // Retry likely helps (network, timeout)
    PERMANENT = 'permanent',        // Retry won't help (bad corpus data, bad config)
    OPERATIONAL = 'operational'     // System issue (file system, decoder)
}

/**
 * Failure Point - Where in the pipeline the error occurred
 */
export enum FailurePoint {
    CORPUS_LOAD = 'corpus_load',
    CORPUS_DRAW = 'corpus_draw',
    CORPUS_REFRESH = 'corpus_refresh',
    IDENTITY_PARSE = 'identity_parse',
    REQUEST_TRANSPORT = 'request_transport',
    RESPONSE_DECODE = 'response_decode',
    CONFIGURATION = 'configuration',
    UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;

    constructor(
        message: string,
        public readonly code: string,
        public readonly retryable: boolean = false,
        context?: ErrorContext,
        category?: ErrorCategory,
        failurePoint?: FailurePoint
    ) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;
        this.category = category || (retryable ? ErrorCategory.TRANSIENT : ErrorCategory.OPERATIONAL);
        this.failurePoint = failurePoint || FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            retryable: this.retryable,
            category: this.category,
            failurePoint: this.failurePoint,
            timestamp: this.timestamp.toISOString(),
            context: this.context,
            stack: this.stack
        };
    }

    /**
     * Get a unique fingerprint for error grouping
     */
    getFingerprint(): string {
        return `${this.code}:${this.failurePoint}`;
    }
}

// ==========================================
// Corpus Errors
// ==========================================

/**
 * The identity source could not be decoded into `{ ua, pct }` records.
 */
export class FormatError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'FORMAT_ERROR',
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CORPUS_LOAD
        );
    }
}

export class EmptyCorpusError extends ApplicationError {
    constructor(message: string = 'Identity corpus has no entries to draw from', context?: ErrorContext) {
        super(
            message,
            'EMPTY_CORPUS',
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CORPUS_DRAW
        );
    }
}

export class CorpusRefreshError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CORPUS_REFRESH_ERROR',
            true,
            context,
            ErrorCategory.TRANSIENT,
            FailurePoint.CORPUS_REFRESH
        );
    }
}

// ==========================================
// Identity Parsing
// ==========================================

/**
 * A single identity-string field could not be extracted.
 * Carried inside parse results and logged; the parser never throws it.
 */
export class ParseError extends ApplicationError {
    constructor(
        message: string,
        public readonly field: string,
        context?: ErrorContext
    ) {
        super(
            message,
            'PARSE_ERROR',
            false,
            { field, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.IDENTITY_PARSE
        );
    }
}

// ==========================================
// Transport Glue Errors
// ==========================================

export class TransportError extends ApplicationError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly attempts: number,
        originalError?: Error,
        context?: ErrorContext
    ) {
        super(
            message,
            'TRANSPORT_ERROR',
            true,
            { url, attempts, originalError: originalError?.message, ...context },
            ErrorCategory.TRANSIENT,
            FailurePoint.REQUEST_TRANSPORT
        );
    }
}

export class DecodeError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'DECODE_ERROR',
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.RESPONSE_DECODE
        );
    }
}

export class ConfigurationError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CONFIGURATION_ERROR',
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CONFIGURATION
        );
    }
}

export class InternalError extends ApplicationError {
    constructor(message: string = 'Internal error', context?: ErrorContext) {
        super(
            message,
            'INTERNAL_ERROR',
            false,
            context,
            ErrorCategory.OPERATIONAL
        );
    }
}

// ==========================================
// Error Utilities
// ==========================================

export function isApplicationError(error: unknown): error is ApplicationError {
    return error instanceof ApplicationError;
}

/**
 * Socket and DNS failures from Node, plus undici's connection and timeout errors
 */
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'UND_ERR_SOCKET',
    'UND_ERR_CLOSED',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT'
]);

const TRANSIENT_MESSAGES = ['timeout', 'econnrefused', 'econnreset', 'enotfound', 'socket hang up'];

export function isRetryableError(error: unknown): boolean {
    if (error instanceof ApplicationError) {
        return error.retryable;
    }
    if (error instanceof Error) {
        if ('code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code)) {
            return true;
        }
        const message = error.message.toLowerCase();
        return TRANSIENT_MESSAGES.some(fragment => message.includes(fragment));
    }
    return false;
}

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalError(error.message, { originalError: error.name, stack: error.stack });
    }
    return new InternalError('Unknown error occurred', { error: String(error) });
}

// ==========================================
// Error Logger
// ==========================================

import logger from '../utils/logger.js';

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            retryable: appError.retryable,
            failurePoint: appError.failurePoint,
            context: appError.context,
            stack: appError.stack
        },
        ...context
    };

    if (appError.category === ErrorCategory.PERMANENT) {
        logger.warn(logData, 'Permanent failure');
    } else {
        logger.error(logData, 'Operation failed');
    }
}
