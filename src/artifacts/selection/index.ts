export { MediaSelector } from './MediaSelector';
export { ExtensionResolver, DEFAULT_EXTENSION } from './ExtensionResolver';
export * from './policy';
