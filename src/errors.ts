// path: src/errors.ts
// Dev note: Error types thrown by the registry. Each carries a stable `code` so callers can branch without matching messages.

export type ChainBattlesErrorCode =
  | "NOT_FOUND"
  | "NOT_OWNER"
  | "ISSUER_EXHAUSTED"
  | "STAT_RECORD_EXISTS"
  | "INVALID_CALLER"
  | "INVALID_TRAIN_CONTEXT"
  | "MALFORMED_DATA_URI";

export class ChainBattlesError extends Error {
  readonly code: ChainBattlesErrorCode;

  constructor(code: ChainBattlesErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TokenNotFoundError extends ChainBattlesError {
  readonly tokenId: number;

  constructor(tokenId: number) {
    super("NOT_FOUND", `Token #${tokenId} does not exist.`);
    this.tokenId = tokenId;
  }
}

export class NotOwnerError extends ChainBattlesError {
  readonly tokenId: number;
  readonly caller: string;

  constructor(tokenId: number, caller: string) {
    super("NOT_OWNER", `${caller} is not the owner of token #${tokenId}.`);
    this.tokenId = tokenId;
    this.caller = caller;
  }
}

export class IssuerExhaustedError extends ChainBattlesError {
  constructor(lastId: number) {
    super("ISSUER_EXHAUSTED", `No token id left after #${lastId}.`);
  }
}

export class StatRecordExistsError extends ChainBattlesError {
  constructor(tokenId: number) {
    super("STAT_RECORD_EXISTS", `Stats for token #${tokenId} already exist.`);
  }
}

export class InvalidCallerError extends ChainBattlesError {
  constructor(caller: string) {
    super("INVALID_CALLER", `"${caller}" is not a valid address.`);
  }
}

export class InvalidTrainContextError extends ChainBattlesError {
  constructor(reason: string) {
    super("INVALID_TRAIN_CONTEXT", reason);
  }
}

export class MalformedDataUriError extends ChainBattlesError {
  constructor(expectedPrefix: string) {
    super("MALFORMED_DATA_URI", `Expected a URI starting with "${expectedPrefix}".`);
  }
}
