/**
 * Renderers
 */

export * from './palette.js';
export * from './snapshot.js';
export * from './full-view.js';
export * from './compact-view.js';
export * from './view.js';
