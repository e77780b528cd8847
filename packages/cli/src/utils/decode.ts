import { TextDecoder } from 'node:util';

export type TextEncodingName = 'utf-8' | 'latin1';

export interface DecodedText {
    text: string;
    encoding: TextEncodingName;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes as UTF-8, or as latin-1 when they are not valid UTF-8.
 * Latin-1 maps every byte to a character, so the fallback cannot fail.
 */
export function decodeText(bytes: Uint8Array): DecodedText {
    try {
        return { text: strictUtf8.decode(bytes), encoding: 'utf-8' };
    } catch (err) {
        if (!(err instanceof TypeError)) throw err;
        return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
    }
}
