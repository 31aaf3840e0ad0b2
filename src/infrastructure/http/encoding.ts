/**
 * Gatehouse - Response Encoding
 *
 * Serializes a {@link GatehouseResponse} for the wire, gzip-compressing the
 * body when the client accepts it.
 */

import { gzipSync } from 'zlib';
import { GatehouseResponse, HeaderValue } from '../platform/types';

export interface EncodedResponse {
  status: number;
  headers: Record<string, HeaderValue>;
  body: Buffer;
}

/**
 * True when `Accept-Encoding` lists gzip (or `*`) without `q=0`
 */
export function acceptsGzip(acceptEncoding: string | undefined): boolean {
  if (!acceptEncoding) {
    return false;
  }

  return acceptEncoding.split(',').some((entry) => {
    const [coding, ...params] = entry.trim().toLowerCase().split(';');
    if (coding.trim() !== 'gzip' && coding.trim() !== '*') {
      return false;
    }
    const quality = params.map((param) => param.trim()).find((param) => param.startsWith('q='));
    return quality === undefined || Number(quality.slice(2)) > 0;
  });
}

export function encodeResponse(response: GatehouseResponse, acceptEncoding?: string): EncodedResponse {
  const headers: Record<string, HeaderValue> = {
    ...response.headers,
    'Content-Type': response.contentType,
    Vary: 'Accept-Encoding',
  };

  let body = Buffer.from(response.body, 'utf8');
  if (acceptsGzip(acceptEncoding)) {
    body = gzipSync(body);
    headers['Content-Encoding'] = 'gzip';
  }
  headers['Content-Length'] = String(body.length);

  return { status: response.status, headers, body };
}
