/**
 * ArtifactWriter - Materializes one artifact on disk
 * Media URLs are streamed to a temp file and renamed into place; JSON is
 * serialized with sorted keys and written the same way.
 */

import { createWriteStream } from 'fs';
import https from 'https';
import { pipeline } from 'stream/promises';
import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { logger } from '../../utils/logger';
import { FileManager } from '../../utils/FileManager';
import { JsonValue } from '../../types/metadata';
import { DownloadError, errorMessage, SerializationError } from '../core/errors';
import { ArtifactRole, ArtifactSource, ArtifactStatus, WriteResult } from '../core/types';

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface ArtifactWriterOptions {
    timeout?: number;
    fetch?: HttpFetch;
}

// IPFS gateways are known to run with expired certificates
const insecureAgent = new https.Agent({ rejectUnauthorized: false });

export function isInsecureGateway(url: string): boolean {
    return url.toLowerCase().startsWith('https://ipfs.');
}

/**
 * Stable JSON: keys sorted at every level, 4-space indent, trailing newline
 */
export function serializeJson(value: JsonValue): string {
    return `${JSON.stringify(sortKeys(value), null, 4)}\n`;
}

function sortKeys(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const object = value;
        // fromEntries defines own properties, so a "__proto__" key survives
        return Object.fromEntries(
            Object.keys(object)
                .sort()
                .map((key): [string, JsonValue] => [key, sortKeys(object[key])]),
        );
    }
    return value;
}

export class ArtifactWriter {
    private readonly fileManager: FileManager;
    private readonly timeout: number;
    private readonly fetch: HttpFetch;

    constructor(fileManager: FileManager, options: ArtifactWriterOptions = {}) {
        this.fileManager = fileManager;
        this.timeout = options.timeout || 60000;
        this.fetch = options.fetch || nodeFetch;
    }

    /**
     * File name an artifact gets for a base name
     */
    static fileNameFor(baseName: string, role: ArtifactRole, source: ArtifactSource): string {
        if (source.kind === 'url') {
            return `${baseName}.${source.extension}`;
        }
        return role === ArtifactRole.TOKEN_METADATA ? `${baseName}-token.json` : `${baseName}.json`;
    }

    pathFor(baseName: string, role: ArtifactRole, source: ArtifactSource): string {
        return this.fileManager.resolvePath(ArtifactWriter.fileNameFor(baseName, role, source));
    }

    async write(baseName: string, role: ArtifactRole, source: ArtifactSource): Promise<WriteResult> {
        await this.fileManager.initialize();

        const filePath = this.pathFor(baseName, role, source);

        if (source.kind === 'json') {
            return this.writeJson(filePath, role, source.value);
        }

        if (await this.fileManager.fileExists(filePath)) {
            const byteSize = await this.fileManager.getFileSize(filePath);
            logger.info('⏭️ Artifact already present, skipping download', { filePath, role, byteSize });
            return { path: filePath, role, byteSize, status: ArtifactStatus.SKIPPED };
        }

        const byteSize = await this.download(source.url, filePath);
        logger.info('💾 File saved', { filePath, role, byteSize });

        return { path: filePath, role, byteSize, status: ArtifactStatus.WRITTEN };
    }

    private async writeJson(filePath: string, role: ArtifactRole, value: JsonValue): Promise<WriteResult> {
        let content: string;
        try {
            content = serializeJson(value);
        } catch (error) {
            throw new SerializationError(`Could not serialize ${role} JSON: ${errorMessage(error)}`);
        }

        const byteSize = await this.fileManager.writeAtomic(filePath, content);
        logger.info('💾 Metadata saved', { filePath, role, byteSize });

        return { path: filePath, role, byteSize, status: ArtifactStatus.WRITTEN };
    }

    /**
     * Stream a URL to a temp file and rename it onto filePath
     */
    private async download(url: string, filePath: string): Promise<number> {
        logger.debug('⬇️ Downloading', { url });

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);
        const tempPath = this.fileManager.createTempPath(filePath);

        try {
            let response: Response;
            try {
                response = await this.fetch(url, {
                    agent: isInsecureGateway(url) ? insecureAgent : undefined,
                    signal: controller.signal,
                });
            } catch (error) {
                throw new DownloadError(url, undefined, this.describeFailure(error, controller));
            }

            if (!response.ok) {
                throw new DownloadError(url, response.status);
            }

            try {
                await pipeline(response.body, createWriteStream(tempPath));
            } catch (error) {
                throw new DownloadError(url, undefined, this.describeFailure(error, controller));
            }

            const byteSize = await this.fileManager.getFileSize(tempPath);
            await this.fileManager.commit(tempPath, filePath);
            return byteSize;
        } catch (error) {
            await this.fileManager.deleteFile(tempPath);
            logger.error('Failed to download artifact', { url, error: errorMessage(error) });
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }

    private describeFailure(error: unknown, controller: AbortController): string {
        return controller.signal.aborted ? `timed out after ${this.timeout}ms` : errorMessage(error);
    }
}
