/**
 * Media selection policy
 *
 * "Prefer the gateway URL" and "duplicate if one URL contains the other" come
 * from observed provider behavior, not from any protocol guarantee, so both
 * are parameters rather than constants.
 */

export enum DuplicateMatchMode {
    /** Same string only. No false positives, misses gateway/raw pairs. */
    EXACT = 'exact',
    /** Either URL contains the other. Catches gateway wrappers of one resource. */
    CONTAINMENT = 'containment',
    /**
     * Scheme, host and a leading /ipfs/ segment removed before containment,
     * so the same content hash on two gateways matches. May match distinct
     * resources whose paths happen to overlap.
     */
    HOST_STRIPPED = 'host-stripped',
}

export interface MediaSelectionPolicy {
    preferGateway: boolean;
    duplicateMatch: DuplicateMatchMode;
    /** HTTP prefix that ipfs:// URIs are rewritten onto */
    ipfsGateway: string;
}

export const DEFAULT_IPFS_GATEWAY = 'https://ipfs.io/ipfs/';

export const DEFAULT_SELECTION_POLICY: MediaSelectionPolicy = {
    preferGateway: true,
    duplicateMatch: DuplicateMatchMode.HOST_STRIPPED,
    ipfsGateway: DEFAULT_IPFS_GATEWAY,
};

export function isDuplicateMatchMode(value: string): value is DuplicateMatchMode {
    return Object.values(DuplicateMatchMode).some((mode) => mode === value);
}

/**
 * Path of a URL without scheme, host and gateway prefix
 */
export function stripGatewayHost(url: string): string {
    if (/^ipfs:\/\//i.test(url)) {
        return url.slice('ipfs://'.length).replace(/^ipfs\//i, '');
    }
    return url
        .replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '')
        .replace(/^\/+/, '')
        .replace(/^ipfs\//i, '');
}

export function isSameResource(
    a: string,
    b: string,
    mode: DuplicateMatchMode,
): boolean {
    switch (mode) {
        case DuplicateMatchMode.EXACT:
            return a === b;

        case DuplicateMatchMode.CONTAINMENT:
            return contains(a, b);

        case DuplicateMatchMode.HOST_STRIPPED:
            return contains(stripGatewayHost(a), stripGatewayHost(b));

        default: {
            const exhaustive: never = mode;
            throw new Error(`Unknown duplicate match mode: ${String(exhaustive)}`);
        }
    }
}

function contains(a: string, b: string): boolean {
    // An empty string is a substring of everything
    if (a.length === 0 || b.length === 0) {
        return false;
    }
    return a.includes(b) || b.includes(a);
}
