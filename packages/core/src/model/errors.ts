// Model-layer error types.

/** Why a received fragment could not be merged into its packet. */
export type AssembleErrorKind =
  | "invalidFragmentId"
  | "fragmentTotalMismatch"
  | "duplicatedFragment"
  | "addressMissing"
  | "unexpectedAddress"
  | "sizeMismatch";

/** A fragment is inconsistent with its header or with earlier fragments. */
export class AssembleError extends Error {
  constructor(
    public readonly kind: AssembleErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "AssembleError";
  }

  static invalidFragmentId(fragTotal: number, fragId: number): AssembleError {
    return new AssembleError(
      "invalidFragmentId",
      `invalid fragment id ${fragId} for a packet of ${fragTotal} fragments`,
    );
  }

  static fragmentTotalMismatch(expected: number, actual: number): AssembleError {
    return new AssembleError(
      "fragmentTotalMismatch",
      `fragment total ${actual} does not match earlier fragments (${expected})`,
    );
  }

  static duplicatedFragment(fragId: number): AssembleError {
    return new AssembleError("duplicatedFragment", `fragment ${fragId} received twice`);
  }

  static addressMissing(): AssembleError {
    return new AssembleError("addressMissing", "first fragment carries no address");
  }

  static unexpectedAddress(fragId: number): AssembleError {
    return new AssembleError("unexpectedAddress", `fragment ${fragId} carries an address`);
  }

  static sizeMismatch(expected: number, actual: number): AssembleError {
    return new AssembleError(
      "sizeMismatch",
      `fragment declared ${expected} bytes but carries ${actual}`,
    );
  }
}

/** Why a payload could not be split for sending. */
export type FragmentErrorKind = "sizeTooSmall" | "tooManyFragments";

/** A payload cannot be fragmented under the given packet size limit. */
export class FragmentError extends Error {
  constructor(
    public readonly kind: FragmentErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "FragmentError";
  }

  static sizeTooSmall(maxPacketSize: number): FragmentError {
    return new FragmentError(
      "sizeTooSmall",
      `packet size limit ${maxPacketSize} leaves no room for fragment data`,
    );
  }

  static tooManyFragments(count: number): FragmentError {
    return new FragmentError("tooManyFragments", `payload needs ${count} fragments (max 255)`);
  }
}
