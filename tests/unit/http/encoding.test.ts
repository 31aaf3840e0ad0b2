import { gunzipSync } from 'zlib';
import { acceptsGzip, encodeResponse } from '../../../src/infrastructure/http/encoding';
import { response } from '../../../src/infrastructure/platform/types';

describe('acceptsGzip', () => {
  it.each([
    ['gzip', true],
    ['deflate, gzip;q=0.5', true],
    ['*', true],
    ['GZIP', true],
    ['gzip;q=0', false],
    ['deflate, br', false],
    ['', false],
  ])('%j → %s', (header, expected) => {
    expect(acceptsGzip(header)).toBe(expected);
  });

  it('should be false without the header', () => {
    expect(acceptsGzip(undefined)).toBe(false);
  });
});

describe('encodeResponse', () => {
  const hello = response().status(200).json().header('X-Cache', 'HIT').body('{"message":"Hello, World!"}').build();

  it('should send the body as is when the client does not accept gzip', () => {
    const encoded = encodeResponse(hello);

    expect(encoded.status).toBe(200);
    expect(encoded.body.toString('utf8')).toBe('{"message":"Hello, World!"}');
    expect(encoded.headers).toEqual({
      'Content-Type': 'application/json; charset=utf-8',
      'X-Cache': 'HIT',
      Vary: 'Accept-Encoding',
      'Content-Length': '27',
    });
  });

  it('should gzip the body when accepted', () => {
    const encoded = encodeResponse(hello, 'gzip, deflate');

    expect(encoded.headers['Content-Encoding']).toBe('gzip');
    expect(encoded.headers['Content-Length']).toBe(String(encoded.body.length));
    expect(gunzipSync(encoded.body).toString('utf8')).toBe('{"message":"Hello, World!"}');
  });

  it('should count bytes, not characters', () => {
    const encoded = encodeResponse(response().body('→').build());

    expect(encoded.headers['Content-Length']).toBe('3');
  });
});
