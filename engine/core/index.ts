/**
 * Row Focus Engine - Core Module Exports
 *
 * This is the main entry point for the focus engine.
 */

// Types - export all
export * from './types/index.js';

// Collated views and the in-memory data source
export * from './collation/index.js';

// Focus tracking
export * from './focus/index.js';
