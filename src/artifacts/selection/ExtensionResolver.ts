/**
 * ExtensionResolver - Picks the file extension for a media URL
 *
 * URLs are usually more specific than the provider's MIME metadata, which is
 * sometimes wrong or generic (application/octet-stream), so the URL path is
 * consulted first, the MIME hint second, and `bin` is the last resort.
 */

export const DEFAULT_EXTENSION = 'bin';

const MEDIA_EXTENSIONS = new Set([
    // Images
    'jpg', 'jpeg', 'png', 'gif', 'webp', 'svg', 'bmp', 'avif', 'tif', 'tiff', 'ico', 'heic',
    // Video
    'mp4', 'webm', 'mov', 'm4v', 'ogv', 'mkv',
    // Audio
    'mp3', 'wav', 'ogg', 'flac',
    // 3D
    'glb', 'gltf',
]);

const MIME_TO_EXTENSION: Record<string, string> = {
    'image/jpeg': 'jpg',
    'image/jpg': 'jpg',
    'image/pjpeg': 'jpg',
    'image/png': 'png',
    'image/gif': 'gif',
    'image/webp': 'webp',
    'image/svg+xml': 'svg',
    'image/bmp': 'bmp',
    'image/avif': 'avif',
    'image/tiff': 'tiff',
    'image/heic': 'heic',
    'image/x-icon': 'ico',
    'video/mp4': 'mp4',
    'video/webm': 'webm',
    'video/quicktime': 'mov',
    'video/x-m4v': 'm4v',
    'video/ogg': 'ogv',
    'video/x-matroska': 'mkv',
    'audio/mpeg': 'mp3',
    'audio/wav': 'wav',
    'audio/ogg': 'ogg',
    'audio/flac': 'flac',
    'model/gltf-binary': 'glb',
    'model/gltf+json': 'gltf',
};

export class ExtensionResolver {
    /**
     * Resolve the extension (lowercase, no leading dot). Never fails.
     */
    static resolve(url: string, mimeHint?: string): string {
        const fromUrl = ExtensionResolver.fromUrl(url);
        if (fromUrl) {
            return fromUrl;
        }

        if (mimeHint) {
            const fromMime = MIME_TO_EXTENSION[ExtensionResolver.normalizeMime(mimeHint)];
            if (fromMime) {
                return fromMime;
            }
        }

        return DEFAULT_EXTENSION;
    }

    /**
     * Lowercase, drop parameters such as `;charset=`, and expand the bare
     * formats providers report (`png`, `jpeg`) into image MIME types
     */
    static normalizeMime(mimeHint: string): string {
        const mime = mimeHint.split(';')[0].trim().toLowerCase();

        if (mime.length === 0 || mime.includes('/')) {
            return mime;
        }
        if (mime === 'jpg') {
            return 'image/jpeg';
        }
        if (mime === 'svg') {
            return 'image/svg+xml';
        }
        return `image/${mime}`;
    }

    private static fromUrl(url: string): string | undefined {
        const path = url.split(/[?#]/)[0];
        const lastSegment = path.slice(path.lastIndexOf('/') + 1);
        const dot = lastSegment.lastIndexOf('.');

        if (dot <= 0) {
            return undefined;
        }

        const extension = lastSegment.slice(dot + 1).toLowerCase();
        return MEDIA_EXTENSIONS.has(extension) ? extension : undefined;
    }
}
