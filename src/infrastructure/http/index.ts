export { NodeHttpAdapter, PayloadTooLargeError, toGatehouseRequest } from './NodeHttpAdapter';
export type { NodeHttpAdapterOptions, ResponseWriter } from './NodeHttpAdapter';
export { encodeResponse, acceptsGzip } from './encoding';
export type { EncodedResponse } from './encoding';
