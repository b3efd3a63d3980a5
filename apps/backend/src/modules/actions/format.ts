/**
 * Value formatting shared by the variant normalizers.
 */

export function amountToString(amount: bigint | null | undefined): string | null {
    return amount == null ? null : amount.toString(10);
}

export function stripNullChars(text: string): string {
    return text.replaceAll('\u0000', '');
}

export function bytesToHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

export function bytesToBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('base64');
}

/**
 * Decode a plaintext comment. Invalid UTF-8 sequences become U+FFFD.
 */
export function decodeComment(bytes: Uint8Array): string {
    return stripNullChars(Buffer.from(bytes).toString('utf8'));
}
