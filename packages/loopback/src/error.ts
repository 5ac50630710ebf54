// Loopback transport errors.

export type LoopbackErrorKind = "closed" | "reset" | "stopped" | "finished";

export class LoopbackError extends Error {
  constructor(
    public readonly kind: LoopbackErrorKind,
    message: string,
    public readonly code?: number,
  ) {
    super(message);
    this.name = "LoopbackError";
  }

  static closed(): LoopbackError {
    return new LoopbackError("closed", "connection closed");
  }

  static reset(code: number): LoopbackError {
    return new LoopbackError("reset", `stream reset by peer (code ${code})`, code);
  }

  static stopped(code: number): LoopbackError {
    return new LoopbackError("stopped", `stream stopped (code ${code})`, code);
  }

  static finished(): LoopbackError {
    return new LoopbackError("finished", "stream already finished");
  }
}
