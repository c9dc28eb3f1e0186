/**
 * Binary sniffing on a raw byte sample.
 *
 * Not a format detector: a NUL byte, or more than 30% of bytes with the high
 * bit set, marks the sample as non-text. Misclassifications are accepted.
 */

const HIGH_BIT_RATIO_LIMIT = 0.30;

export function looksBinary(sample: Uint8Array): boolean {
    if (sample.length === 0) return false;

    let highBit = 0;
    for (const byte of sample) {
        if (byte === 0x00) return true;
        if (byte > 0x7f) highBit++;
    }

    return highBit / sample.length > HIGH_BIT_RATIO_LIMIT;
}
