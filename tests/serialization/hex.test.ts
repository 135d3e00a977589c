import { fromHex, toHex } from '../../src/serialization/hex';
import { expectStatusListError } from '../support/errors';

describe('hex', () => {
  it('formats lowercase, two digits per byte', () => {
    expect(toHex(new Uint8Array([0x00, 0x0a, 0xab, 0xff]))).toBe('000aabff');
  });

  it('parses either case and ignores whitespace', () => {
    expect(fromHex('00 0A\nab FF')).toEqual(new Uint8Array([0x00, 0x0a, 0xab, 0xff]));
  });

  it('parses an empty string', () => {
    expect(fromHex('')).toEqual(new Uint8Array(0));
  });

  it('rejects odd lengths and non-hex characters', () => {
    expectStatusListError(() => fromHex('abc'), 'MALFORMED_ENCODING');
    expectStatusListError(() => fromHex('zz'), 'MALFORMED_ENCODING');
    expectStatusListError(() => fromHex('0x12'), 'MALFORMED_ENCODING');
  });
});
