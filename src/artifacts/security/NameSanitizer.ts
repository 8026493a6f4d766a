/**
 * NameSanitizer - Turns display names into filesystem-safe base names
 */

import { getObject, getString, MetadataDocument } from '../../types/metadata';

const MAX_NAME_LENGTH = 200;

export class NameSanitizer {
    /**
     * Sanitize an arbitrary display string. Total and idempotent.
     */
    static sanitize(raw: string | null | undefined): string {
        if (!raw) {
            return '';
        }

        const cleaned = NameSanitizer.clean(raw);
        // Limit by code points so a surrogate pair is never split
        const limited = Array.from(cleaned).slice(0, MAX_NAME_LENGTH).join('');

        return NameSanitizer.trimHyphens(limited);
    }

    /**
     * Base name for every artifact of one token:
     * metadata.name, then title, then token-{id}
     */
    static resolveBaseName(doc: MetadataDocument, tokenId: string): string {
        const fromName = NameSanitizer.sanitize(getString(getObject(doc, 'metadata'), 'name'));
        if (fromName) {
            return fromName;
        }

        const fromTitle = NameSanitizer.sanitize(getString(doc, 'title'));
        if (fromTitle) {
            return fromTitle;
        }

        return `token-${tokenId}`;
    }

    private static clean(value: string): string {
        return value
            .replace(/\s+/g, '-')
            // Characters rejected by common filesystems, plus C0, DEL and C1 controls
            .replace(/[<>:"/\\|?*\x00-\x1F\x7F-\x9F]/g, '')
            .replace(/-+/g, '-');
    }

    private static trimHyphens(value: string): string {
        return value.replace(/^-+|-+$/g, '');
    }
}
