export * from './error-codes.js';
export * from './oauth-error.js';
export * from './auth-error.js';
