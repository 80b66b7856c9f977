/**
 * Utility functions for bili-follow-sync
 */

// Pacing helpers (sleep, unit conversion)
export * from './pacing/index.js';

// Serialized request queue
export * from './request-scheduler/index.js';
