export * from './hash.js';
export * from './random.js';
export * from './jwt.js';
export * from './pkce.js';
