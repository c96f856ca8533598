/**
 * Session module exports
 */

export { SessionHost, classifyListenError } from './host.js';
export { receive, receiveInto } from './client.js';
export { encodeRendezvous, decodeRendezvous, generateSecret } from './codec.js';
export { UpnpPortMapper, UpnpGatewayDriver, selectGateway } from './nat.js';
export type { GatewayDriver, GatewayCandidate, MappingRequest, PortMapper, PortMapperOptions } from './nat.js';
export {
  serveConnection,
  encodeLengthHeader,
  decodeLengthHeader,
  secretsMatch,
  SocketReader,
  LENGTH_HEADER_BYTES,
} from './protocol.js';
export type { ServeOptions } from './protocol.js';
export type {
  RendezvousInfo,
  SessionState,
  PortMapping,
  SessionHostOptions,
  ReceiveOptions,
  ReceiveIntoOptions,
  PayloadConsumer,
  ServedConnection,
  SessionHostEvents,
} from './types.js';
