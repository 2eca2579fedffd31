export type SemverErrorKind =
  | "MalformedVersion"
  | "UnrecognizedBranch"
  | "UnsupportedRunMode"
  | "RemoteVersionCorrupt"
  | "LocalVersionCorrupt"
  | "DirtyWorkingTree"
  | "DelegationUnavailable"
  | "Config"
  | "Unexpected";

/** Base for every failure the resolver reports; `kind` drives exit handling. */
export abstract class SemverError extends Error {
  abstract readonly kind: SemverErrorKind;
}

export class MalformedVersionError extends SemverError {
  readonly kind = "MalformedVersion";
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
    this.name = "MalformedVersionError";
  }
}
export class UnrecognizedBranchError extends SemverError {
  readonly kind = "UnrecognizedBranch";
  constructor(readonly branch: string) {
    super(
      `Branch "${branch}" matches neither d.d.d*, v+d_d_d*, the mainline branch nor a hash`,
    );
    this.name = "UnrecognizedBranchError";
  }
}
export class UnsupportedRunModeError extends SemverError {
  readonly kind = "UnsupportedRunMode";
  constructor(readonly runMode: string) {
    super(`Run mode ${runMode} has no handler`);
    this.name = "UnsupportedRunModeError";
  }
}
export class RemoteVersionCorruptError extends SemverError {
  readonly kind = "RemoteVersionCorrupt";
  constructor(message: string) {
    super(message);
    this.name = "RemoteVersionCorruptError";
  }
}
export class LocalVersionCorruptError extends SemverError {
  readonly kind = "LocalVersionCorrupt";
  constructor(message: string) {
    super(message);
    this.name = "LocalVersionCorruptError";
  }
}
export class DirtyWorkingTreeError extends SemverError {
  readonly kind = "DirtyWorkingTree";
  constructor(message = "Working tree has uncommitted changes") {
    super(message);
    this.name = "DirtyWorkingTreeError";
  }
}
export class DelegationUnavailableError extends SemverError {
  readonly kind = "DelegationUnavailable";
  constructor(message: string) {
    super(message);
    this.name = "DelegationUnavailableError";
  }
}
export class ConfigError extends SemverError {
  readonly kind = "Config";
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class UnexpectedError extends SemverError {
  readonly kind = "Unexpected";
  constructor(message: string) {
    super(message);
    this.name = "UnexpectedError";
  }
}
