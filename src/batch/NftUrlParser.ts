/**
 * NftUrlParser - Extracts (contract, token id) from marketplace links
 * and plain references found in spreadsheet cells
 */

export interface TokenReference {
    contractAddress: string;
    tokenId: string;
}

const OPENSEA_PATTERN = /\/assets\/(?:ethereum|eth)\/([0-9a-fA-Fx]+)\/(\d+)/;
const RARIBLE_PATTERN = /\/token\/([0-9a-fA-Fx]+):(\d+)/;
const DIRECT_PATTERN = /(0x[0-9a-fA-F]{40})[/:]+(\d+)/;
const CONTRACT_PREFIX = /^(0x[0-9a-fA-F]{40})/;
const TOKEN_PREFIX = /^(\d+)/;

export class NftUrlParser {
    /**
     * Supports:
     * - OpenSea: https://opensea.io/assets/ethereum/0xCONTRACT/TOKEN
     * - Rarible: https://rarible.com/token/0xCONTRACT:TOKEN
     * - Direct: 0xCONTRACT/TOKEN or 0xCONTRACT:TOKEN
     * - Contract and token separated by whitespace or a comma
     */
    static parse(value: string | undefined | null): TokenReference | null {
        if (!value || !value.trim()) {
            return null;
        }

        const text = value.trim();

        for (const pattern of [OPENSEA_PATTERN, RARIBLE_PATTERN, DIRECT_PATTERN]) {
            const match = pattern.exec(text);
            if (match) {
                return { contractAddress: match[1], tokenId: match[2] };
            }
        }

        const parts = text.split(/[,\s]+/);
        if (parts.length >= 2) {
            const contract = CONTRACT_PREFIX.exec(parts[0]);
            const token = TOKEN_PREFIX.exec(parts[1]);
            if (contract && token) {
                return { contractAddress: contract[1], tokenId: token[1] };
            }
        }

        return null;
    }

    /**
     * First cell of a row that holds a token reference
     */
    static fromRow(row: string[]): TokenReference | null {
        for (const cell of row) {
            const reference = NftUrlParser.parse(cell);
            if (reference) {
                return reference;
            }
        }
        return null;
    }
}
