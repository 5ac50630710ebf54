// TUIC wire protocol types and codec
//
// This package contains the TUIC v5 header and address formats, the codec
// that marshals them from buffers and async byte sources, and the decode
// error type.

// ============================================================================
// Wire Types
// ============================================================================

export type {
  AddressNone,
  AddressDomain,
  AddressIpv4,
  AddressIpv6,
  Address,
  HeaderAuthenticate,
  HeaderConnect,
  HeaderPacket,
  HeaderDissociate,
  HeaderHeartbeat,
  Header,
  CommandName,
} from "./types.ts";

export {
  // Constants and discriminants
  VERSION,
  TOKEN_LENGTH,
  CommandDiscriminant,
  AddressDiscriminant,
  commandName,
  // Factory functions
  addressNone,
  addressDomain,
  addressIpv4,
  addressIpv6,
  headerAuthenticate,
  headerConnect,
  headerPacket,
  headerDissociate,
  headerHeartbeat,
} from "./types.ts";

// ============================================================================
// Addresses
// ============================================================================

export {
  MAX_DOMAIN_LENGTH,
  addressLength,
  writeAddress,
  addressParser,
  formatAddress,
  parseAddress,
} from "./address.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  type ByteSource,
  headerLength,
  writeHeader,
  encodeHeader,
  headerParser,
  decodeHeader,
  readHeader,
} from "./codec.ts";

export { type DecodeResult, concat } from "./binary.ts";

export { UnmarshalError, type UnmarshalErrorKind } from "./unmarshal_error.ts";
