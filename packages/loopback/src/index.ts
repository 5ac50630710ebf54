// In-process QUIC transport for tuic-mux

export {
  LoopbackConnection,
  type LoopbackBiStream,
  type LoopbackOptions,
  DEFAULT_MAX_DATAGRAM_SIZE,
  loopbackPair,
} from "./connection.ts";
export { LoopbackSendStream, LoopbackRecvStream, createStreamPair } from "./stream.ts";
export { type Channel, createChannel } from "./channel.ts";
export { LoopbackError, type LoopbackErrorKind } from "./error.ts";
