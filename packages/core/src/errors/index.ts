const DISABLE_STACKTRACE : boolean = true;

export class SeekboxError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class InvalidInputError      extends SeekboxError {}
export class CapacityExceededError  extends SeekboxError {}
export class MalformedHeaderError   extends SeekboxError {}
export class AuthenticationError    extends SeekboxError {}
export class IncompleteStreamError  extends SeekboxError {}
export class StreamClosedError      extends SeekboxError {}
export class CipherError            extends SeekboxError {}
export class FilesystemError        extends SeekboxError {}
