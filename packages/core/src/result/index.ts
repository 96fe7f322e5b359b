export { ConstraintError, SourceDeckError, toError } from "./errors";
export { Err, Ok, type Result, unwrapOrThrow } from "./result";
