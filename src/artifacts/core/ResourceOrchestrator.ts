/**
 * ResourceOrchestrator - Produces every artifact for one token
 *
 * Provider metadata is structurally inconsistent across minting methods, so
 * resolution is best-effort: each role succeeds or fails on its own and every
 * outcome is recorded in the manifest.
 */

import { logger } from '../../utils/logger';
import { getObject, getString, MetadataDocument, SimplifiedMetadata } from '../../types/metadata';
import { NameSanitizer } from '../security/NameSanitizer';
import { ExtensionResolver } from '../selection/ExtensionResolver';
import { MediaSelector } from '../selection/MediaSelector';
import { ArtifactWriter } from '../writer/ArtifactWriter';
import { errorMessage } from './errors';
import {
    ArtifactManifest,
    ArtifactRole,
    ArtifactSource,
    ArtifactStatus,
    MediaCandidate,
    ManifestEntry,
    ResolvedMedia,
    SelectionConfig,
} from './types';

interface PlannedWrite {
    role: ArtifactRole;
    baseName: string;
    source: ArtifactSource;
    url?: string;
}

/**
 * Lossy projection of the fields worth keeping next to the media.
 * Reads `metadata` when present, the top level otherwise.
 */
export function simplifyMetadata(doc: MetadataDocument): SimplifiedMetadata {
    const section = getObject(doc, 'metadata') ?? doc;
    const simplified: SimplifiedMetadata = {};

    const name = getString(section, 'name');
    if (name) simplified.name = name;

    const description = getString(section, 'description');
    if (description) simplified.description = description;

    const tags = section.tags;
    if (Array.isArray(tags)) {
        const stringTags = tags.filter((tag): tag is string => typeof tag === 'string');
        if (stringTags.length > 0) simplified.tags = stringTags;
    }

    const createdBy = getString(section, 'createdBy');
    if (createdBy) simplified.createdBy = createdBy;

    const yearCreated = section.yearCreated;
    if ((typeof yearCreated === 'string' && yearCreated.length > 0) || typeof yearCreated === 'number') {
        simplified.yearCreated = yearCreated;
    }

    return simplified;
}

export class ResourceOrchestrator {
    private readonly selector: MediaSelector;
    private readonly writer: ArtifactWriter;

    constructor(selector: MediaSelector, writer: ArtifactWriter) {
        this.selector = selector;
        this.writer = writer;
    }

    async resolveAndSave(
        doc: MetadataDocument,
        tokenId: string,
        contractAddress: string,
        config: SelectionConfig,
    ): Promise<ArtifactManifest> {
        const baseName = NameSanitizer.resolveBaseName(doc, tokenId);
        logger.debug('Saving resources for token', { tokenId, contractAddress, baseName });

        const { primary, thumbnail } = this.selector.select(doc, config);
        const media = this.resolveMedia(primary, thumbnail);

        const writes: PlannedWrite[] = media.map((item): PlannedWrite => ({
            role: item.role,
            baseName: this.mediaBaseName(baseName, item, media),
            source: { kind: 'url', url: item.url, extension: item.extension },
            url: item.url,
        }));

        writes.push(
            {
                role: ArtifactRole.METADATA,
                baseName,
                source: { kind: 'json', value: simplifyMetadata(doc) },
            },
            {
                role: ArtifactRole.TOKEN_METADATA,
                baseName,
                source: { kind: 'json', value: doc },
            },
        );

        const entries = await Promise.all(writes.map((planned) => this.execute(planned)));
        const failed = entries.filter((entry) => entry.status === ArtifactStatus.FAILED).length;

        logger.info('✅ Token resources processed', {
            tokenId,
            baseName,
            artifacts: entries.length,
            failed,
        });

        return { tokenId, contractAddress, baseName, entries };
    }

    private resolveMedia(primary?: MediaCandidate, thumbnail?: MediaCandidate): ResolvedMedia[] {
        const media: ResolvedMedia[] = [];

        if (primary) {
            media.push({
                url: primary.url,
                extension: ExtensionResolver.resolve(primary.url, primary.mimeHint),
                role: ArtifactRole.PRIMARY,
            });
        }
        if (thumbnail) {
            media.push({
                url: thumbnail.url,
                extension: ExtensionResolver.resolve(thumbnail.url, thumbnail.mimeHint),
                role: ArtifactRole.THUMBNAIL,
            });
        }

        return media;
    }

    /**
     * The thumbnail shares the primary's stem unless both would land on the
     * same file name
     */
    private mediaBaseName(baseName: string, item: ResolvedMedia, media: ResolvedMedia[]): string {
        if (item.role !== ArtifactRole.THUMBNAIL) {
            return baseName;
        }
        const clashes = media.some(
            (other) => other.role === ArtifactRole.PRIMARY && other.extension === item.extension,
        );
        return clashes ? `${baseName}-thumbnail` : baseName;
    }

    private async execute(planned: PlannedWrite): Promise<ManifestEntry> {
        const path = this.writer.pathFor(planned.baseName, planned.role, planned.source);

        try {
            const result = await this.writer.write(planned.baseName, planned.role, planned.source);
            return {
                role: result.role,
                path: result.path,
                byteSize: result.byteSize,
                status: result.status,
                url: planned.url,
            };
        } catch (error) {
            logger.warn('Artifact failed', { role: planned.role, path, error: errorMessage(error) });
            return {
                role: planned.role,
                path,
                byteSize: 0,
                status: ArtifactStatus.FAILED,
                url: planned.url,
                error: errorMessage(error),
            };
        }
    }
}
