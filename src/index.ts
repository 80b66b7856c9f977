/**
 * bili-follow-sync
 *
 * Exports the following list of one bilibili account and replays it as
 * follows on another.
 */

// Shared types
export * from './shared/types/index.js';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/credential/index.js';
export * from './services/following-export/index.js';
export * from './services/following-store/index.js';
export * from './services/auto-follow/index.js';

// Export command-line programs
export * from './cli/index.js';

export const version = '0.1.0';
