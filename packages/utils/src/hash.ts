import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex, concatBytes, utf8ToBytes } from "@noble/hashes/utils"

/** SHA-256 of the UTF-8 encoding of `text` */
export const hashText = (text: string): Uint8Array => sha256(utf8ToBytes(text))

/**
 * Combine a sequence of digests into one hex digest. The order of `parts`
 * is significant; the same parts in the same order always give the same result.
 */
export function combineHashes(prefix: string, parts: Iterable<Uint8Array>): string {
	return bytesToHex(sha256(concatBytes(hashText(prefix), ...parts)))
}
