// OAuth types
export * from './oauth.js';

// Tenant types
export * from './tenant.js';

// Client types
export * from './client.js';

// Request models
export * from './authorize-request.js';
export * from './token-request.js';

// Token types
export * from './token.js';

// User types
export * from './user.js';

// CIBA and DPoP
export * from './ciba.js';
export * from './dpop.js';

export * from './result.js';

// Hono context types
export * from './hono.js';
