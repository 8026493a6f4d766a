/**
 * MediaSelector - Decides which URL is the primary media and which is the
 * thumbnail for one metadata document
 *
 * Primary: metadata.media.uri (often the full-resolution original)
 * Thumbnail: media[0], gateway URL preferred over the raw one
 */

import { logger } from '../../utils/logger';
import {
    getArray,
    getObject,
    getString,
    isJsonObject,
    MetadataDocument,
} from '../../types/metadata';
import { MediaCandidate, MediaSelection, SelectionConfig } from '../core/types';
import { DEFAULT_SELECTION_POLICY, isSameResource, MediaSelectionPolicy } from './policy';

export class MediaSelector {
    private readonly policy: MediaSelectionPolicy;

    constructor(policy: Partial<MediaSelectionPolicy> = {}) {
        this.policy = { ...DEFAULT_SELECTION_POLICY, ...policy };
    }

    /**
     * Select candidates. Never fails: a missing location yields no candidate.
     */
    select(doc: MetadataDocument, config: SelectionConfig): MediaSelection {
        const primary = this.primaryCandidate(doc);

        if (!config.downloadThumbnails) {
            return { primary };
        }

        const thumbnail = this.thumbnailCandidate(doc);

        if (primary && thumbnail && isSameResource(primary.url, thumbnail.url, this.policy.duplicateMatch)) {
            logger.debug('Skipping duplicate thumbnail (same as primary media)', {
                primary: primary.url,
                thumbnail: thumbnail.url,
                mode: this.policy.duplicateMatch,
            });
            return { primary };
        }

        return { primary, thumbnail };
    }

    /**
     * Rewrite ipfs:// URIs onto the configured HTTP gateway
     */
    toFetchableUrl(uri: string): string {
        if (!/^ipfs:\/\//i.test(uri)) {
            return uri;
        }

        const path = uri.slice('ipfs://'.length).replace(/^ipfs\//i, '');
        const gateway = this.policy.ipfsGateway.endsWith('/')
            ? this.policy.ipfsGateway
            : `${this.policy.ipfsGateway}/`;

        return `${gateway}${path}`;
    }

    private primaryCandidate(doc: MetadataDocument): MediaCandidate | undefined {
        const media = getObject(getObject(doc, 'metadata'), 'media');
        const uri = getString(media, 'uri');

        if (!uri) {
            return undefined;
        }

        return {
            url: this.toFetchableUrl(uri),
            mimeHint: getString(media, 'mimeType'),
        };
    }

    private thumbnailCandidate(doc: MetadataDocument): MediaCandidate | undefined {
        const first = getArray(doc, 'media')?.[0];
        if (!isJsonObject(first)) {
            return undefined;
        }

        const gateway = getString(first, 'gateway');
        const raw = getString(first, 'raw');
        const chosen = this.policy.preferGateway ? gateway ?? raw : raw ?? gateway;

        if (!chosen) {
            return undefined;
        }

        return {
            url: this.toFetchableUrl(chosen),
            gatewayUrl: gateway,
            mimeHint: getString(first, 'format'),
        };
    }
}
