/**
 * Artifact System - Main Entry Point
 * Resolves one token's metadata document into files on disk
 */

export * from './core';
export * from './security';
export * from './selection';
export * from './writer';
