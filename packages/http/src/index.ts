// HTTP client utilities shared by the service clients
export * from './client.js';

export * from './types.js';

export * from './api-error.js';
export * from './headers.js';
export * from './stream.js';

// Export pure functional core functions
export * from './core/http-utils.js';
export * from './core/types.js';
