import { describe, it, expect } from 'vitest';
import { decodeText } from '../src/utils/decode.js';

describe('decodeText', () => {
    it('reads valid UTF-8 as UTF-8', () => {
        expect(decodeText(Buffer.from('Café,-4.50', 'utf8'))).toEqual({ text: 'Café,-4.50', encoding: 'utf-8' });
    });

    it('falls back to latin-1 for bytes that are not UTF-8', () => {
        const bytes = Buffer.from([0x43, 0x41, 0x46, 0xc9]);
        expect(decodeText(bytes)).toEqual({ text: 'CAFÉ', encoding: 'latin1' });
    });

    it('drops a UTF-8 byte order mark', () => {
        expect(decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x41])).text).toBe('A');
    });
});
