export type MemoryErrorKind =
  | "validation"
  | "invalid_relationship_type"
  | "self_loop"
  | "unsupported_backend";

export class MemoryError extends Error {
  constructor(
    readonly kind: MemoryErrorKind,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends MemoryError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class InvalidRelationshipTypeError extends MemoryError {
  constructor(
    readonly relationshipType: string,
    readonly allowed: readonly string[],
  ) {
    super(
      "invalid_relationship_type",
      `invalid relationship type '${relationshipType}' (allowed: ${allowed.join(", ")})`,
    );
  }
}

export class SelfLoopError extends MemoryError {
  constructor(readonly nodeId: string) {
    super("self_loop", `cannot link node ${nodeId} to itself`);
  }
}

export class UnsupportedBackendError extends MemoryError {
  constructor(
    readonly backend: string,
    readonly supported: readonly string[],
  ) {
    super(
      "unsupported_backend",
      `unsupported vector backend '${backend}' (supported: ${supported.join(", ")})`,
    );
  }
}

export function isMemoryError(err: unknown): err is MemoryError {
  return err instanceof MemoryError;
}
