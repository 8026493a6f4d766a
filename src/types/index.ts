/**
 * Type definitions shared across the application
 */

export * from './metadata';
export type { AppConfig, ProviderConfig, ServerConfig } from './config';
export type { AppContext } from './app';
