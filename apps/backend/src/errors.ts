export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Unknown session: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string, readonly phase: string) {
    super(`Session ${sessionId} is busy (${phase})`);
    this.name = "SessionBusyError";
  }
}
