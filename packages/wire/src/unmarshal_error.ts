// Header decode errors.

/** Why a header could not be decoded. */
export type UnmarshalErrorKind =
  | "invalidVersion"
  | "invalidCommand"
  | "invalidAddressType"
  | "invalidEncoding"
  | "unexpectedEof"
  | "io";

/**
 * Header decode error.
 *
 * Raised by both the buffer decoder and the streaming reader. `io` wraps a
 * failure of the underlying byte source; `cause` holds what it threw.
 */
export class UnmarshalError extends Error {
  constructor(
    public readonly kind: UnmarshalErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "UnmarshalError";
  }

  static invalidVersion(version: number): UnmarshalError {
    return new UnmarshalError("invalidVersion", `invalid version: ${version}`);
  }

  static invalidCommand(command: number): UnmarshalError {
    return new UnmarshalError("invalidCommand", `invalid command: ${command}`);
  }

  static invalidAddressType(addrType: number): UnmarshalError {
    return new UnmarshalError("invalidAddressType", `invalid address type: ${addrType}`);
  }

  static invalidEncoding(): UnmarshalError {
    return new UnmarshalError("invalidEncoding", "address is not valid UTF-8");
  }

  static unexpectedEof(): UnmarshalError {
    return new UnmarshalError("unexpectedEof", "unexpected end of header");
  }

  static io(cause: unknown): UnmarshalError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new UnmarshalError("io", `read error: ${detail}`, cause);
  }
}
