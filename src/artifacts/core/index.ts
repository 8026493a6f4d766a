/**
 * Core index - exports all core components
 */

export * from './types';
export * from './errors';
export { ResourceOrchestrator, simplifyMetadata } from './ResourceOrchestrator';
