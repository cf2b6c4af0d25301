/**
 * Type definitions
 *
 * @fileoverview Re-exports of the shared wmfdb types
 * @since 0.1.0
 */

// Error types
export * from './types/errorTypes.js';

// Connection parameter types
export * from './types/connectionTypes.js';
