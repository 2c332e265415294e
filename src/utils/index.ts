/**
 * Utility functions
 */

// Retry engine
export * from './retry/index.js';

// Complexity estimation and pacing
export * from './request-scheduler/index.js';
