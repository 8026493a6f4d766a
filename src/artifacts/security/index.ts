/**
 * Security index - exports name sanitization
 */

export { NameSanitizer } from './NameSanitizer';
