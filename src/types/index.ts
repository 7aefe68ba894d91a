// OAuth types
export * from './oauth.js';

// Client types
export * from './client.js';

// Token types
export * from './token.js';

// User types
export * from './user.js';

// Hono context types
export * from './hono.js';
