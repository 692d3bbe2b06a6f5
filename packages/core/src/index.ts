/**
 * kubesim Core Package
 * Object store, node lifecycle manager and reconciler
 * @module @kubesim/core
 */

// Object store and placement transactions
export * from './stores';

// Models
export * from './models';

// Services
export * from './services';

