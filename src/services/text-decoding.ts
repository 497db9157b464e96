import { TextDecoder } from 'node:util';

export const DEFAULT_ENCODING = 'utf-8-sig';

interface DecoderSettings {
    label: string;
    ignoreBOM: boolean;
}

/**
 * `utf-8-sig` strips a leading byte-order mark, plain `utf-8` keeps it as
 * U+FEFF. Every other WHATWG label is passed through and loses its BOM.
 */
function decoderSettings(encoding: string): DecoderSettings {
    const normalized = encoding.trim().toLowerCase();
    if (normalized === 'utf-8-sig' || normalized === 'utf8-sig') {
        return { label: 'utf-8', ignoreBOM: false };
    }
    if (normalized === 'utf-8' || normalized === 'utf8') {
        return { label: 'utf-8', ignoreBOM: true };
    }
    return { label: normalized, ignoreBOM: false };
}

export function isSupportedEncoding(encoding: string): boolean {
    try {
        new TextDecoder(decoderSettings(encoding).label);
        return true;
    } catch (err) {
        if (err instanceof RangeError) return false;
        throw err;
    }
}

/** Decode `bytes`, throwing a `TypeError` on byte sequences invalid for the encoding. */
export function decodeBytes(bytes: Uint8Array, encoding: string): string {
    const { label, ignoreBOM } = decoderSettings(encoding);
    return new TextDecoder(label, { fatal: true, ignoreBOM }).decode(bytes);
}
