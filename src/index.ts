export type * from "./core/_hash.js";

export type * from "./core/sha256-context.js";
export { default as Sha256Context } from "./core/sha256-context.js";

export type * from "./core/sha256.js";
export { createSha256, default as sha256 } from "./core/sha256.js";

export type { ErrorMeta, Issue } from "./shared/errors.js";
export {
  ContextErrorBase,
  ContextFinishedError,
  ErrorBase,
  InvalidInputError,
  InvalidInputErrorBase,
  TypeError,
  UnexpectedValidationError,
  ValidationErrorBase,
} from "./shared/errors.js";

export type { ILogger, LogEntry } from "./shared/logger.js";
export { LogLevel } from "./shared/logger.js";

export type {
  ByteLength,
  Bytes32,
  Bytes32Like,
  HashState,
  HashStateLike,
  Uint32,
  Uint8,
} from "./shared/schemas.js";
export {
  BLOCK_SIZE,
  ByteLengthSchema,
  Bytes32Schema,
  DIGEST_SIZE,
  HashStateSchema,
  Uint32Schema,
  Uint8Schema,
} from "./shared/schemas.js";

export type { Uint8ArraySource } from "./shared/to-uint8-array.js";
