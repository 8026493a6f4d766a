/**
 * Core Types for Artifact Resolution
 * Shared by the selector, the writer and the orchestrator
 */

import type { JsonValue } from '../../types/metadata';

// ============================================================================
// Enums
// ============================================================================

export enum ArtifactRole {
    PRIMARY = 'primary',
    THUMBNAIL = 'thumbnail',
    METADATA = 'metadata',
    TOKEN_METADATA = 'token-metadata',
}

export enum ArtifactStatus {
    WRITTEN = 'written',
    SKIPPED = 'skipped',
    FAILED = 'failed',
}

/** Roles that come from a media URL rather than from JSON */
export type MediaRole = ArtifactRole.PRIMARY | ArtifactRole.THUMBNAIL;

/** Roles serialized from the metadata document */
export type JsonRole = ArtifactRole.METADATA | ArtifactRole.TOKEN_METADATA;

// ============================================================================
// Media Types
// ============================================================================

export interface MediaCandidate {
    url: string;
    gatewayUrl?: string;
    mimeHint?: string;
}

export interface ResolvedMedia {
    url: string;
    extension: string;
    role: MediaRole;
}

export interface MediaSelection {
    primary?: MediaCandidate;
    thumbnail?: MediaCandidate;
}

export interface SelectionConfig {
    downloadThumbnails: boolean;
}

// ============================================================================
// Write Types
// ============================================================================

export type ArtifactSource =
    | { kind: 'url'; url: string; extension: string }
    | { kind: 'json'; value: JsonValue };

export interface WriteResult {
    path: string;
    role: ArtifactRole;
    byteSize: number;
    status: ArtifactStatus.WRITTEN | ArtifactStatus.SKIPPED;
}

// ============================================================================
// Manifest Types
// ============================================================================

export interface ManifestEntry {
    role: ArtifactRole;
    path: string;
    byteSize: number;
    status: ArtifactStatus;
    url?: string;
    error?: string;
}

export interface ArtifactManifest {
    tokenId: string;
    contractAddress: string;
    baseName: string;
    entries: ManifestEntry[];
}
