import crypto from "crypto";

const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
// largest multiple of the alphabet size that fits in a byte; bytes above it are rejected
const BYTE_LIMIT = Math.floor(256 / ALPHABET.length) * ALPHABET.length;

/**
 * Generate an ID that is easy for humans to read and copy back:
 * four groups of four alphanumeric characters, e.g. `abcd-1234-ABCD-wxyz`.
 */
export function humanReadableId(groups = 4, groupLength = 4) {
    const length = groups * groupLength;
    let chars = "";
    while (chars.length < length) {
        for (const byte of crypto.randomBytes(length)) {
            if (byte >= BYTE_LIMIT) continue;
            chars += ALPHABET[byte % ALPHABET.length];
            if (chars.length === length) break;
        }
    }
    const parts: string[] = [];
    for (let i = 0; i < length; i += groupLength) parts.push(chars.slice(i, i + groupLength));
    return parts.join("-");
}
