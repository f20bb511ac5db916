// Identity emulation
export * from './identity/types.js';
export * from './identity/browser-family.js';
export * from './identity/random.js';
export * from './identity/identity-parser.js';
export * from './identity/client-hints.js';
export * from './identity/identity-corpus.js';
export * from './identity/emulated-session.js';
export * from './identity/header-policy.js';

// Types
export * from './types/errors.js';

// Utils
export * from './utils/env-validator.js';
export * from './utils/html-parser.js';
export { default as logger, contextStorage } from './utils/logger.js';
