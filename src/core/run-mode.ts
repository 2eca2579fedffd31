import {
  DelegationUnavailableError,
  UnsupportedRunModeError,
} from "../types/errors";
import { fail, ok, type Result } from "../types/result";
import type { TagPattern } from "./consistency";
import { formatTriple, type SemanticVersion } from "./version-parser";

/**
 * - RELEASE: plain semver tag, handed to a release-plugin style flow
 * - RELEASE_BRANCH: tag prefixed with the branch fragment
 * - RELEASE_BRANCH_RPM: as RELEASE_BRANCH, plus an RPM release number in the build metadata
 * - NATIVE (default): plain semver tag, tagged directly
 * - NATIVE_BRANCH / NATIVE_BRANCH_RPM: branch variants of NATIVE
 */
export const RUN_MODES = [
  "RELEASE",
  "RELEASE_BRANCH",
  "RELEASE_BRANCH_RPM",
  "NATIVE",
  "NATIVE_BRANCH",
  "NATIVE_BRANCH_RPM",
  "UNSPECIFIED",
] as const;

export type RunMode = (typeof RUN_MODES)[number];
export type BumpKind = "major" | "minor" | "patch";

export const DEFAULT_RUN_MODE: RunMode = "NATIVE";
export const DEVELOPMENT_QUALIFIER = "SNAPSHOT";

export const VERSION_KEYS = [
  "DEVELOPMENT",
  "RELEASE",
  "SCM_TAG",
  "METADATA",
  "MAJOR",
  "MINOR",
  "PATCH",
] as const;
export type VersionKey = (typeof VERSION_KEYS)[number];
export type VersionBundle = Readonly<Record<VersionKey, string>>;

export function parseRunMode(name: string | undefined): RunMode {
  if (name === undefined || name === "") return DEFAULT_RUN_MODE;
  const match = RUN_MODES.find((mode) => mode === name);
  return match ?? "UNSPECIFIED";
}

export function isBranchMode(mode: RunMode): boolean {
  return (
    mode === "RELEASE_BRANCH" ||
    mode === "RELEASE_BRANCH_RPM" ||
    mode === "NATIVE_BRANCH" ||
    mode === "NATIVE_BRANCH_RPM"
  );
}

export function isRpmMode(mode: RunMode): boolean {
  return mode === "RELEASE_BRANCH_RPM" || mode === "NATIVE_BRANCH_RPM";
}

export function bumpVersion(
  version: SemanticVersion,
  kind: BumpKind,
): SemanticVersion {
  switch (kind) {
    case "major":
      return Object.freeze({ major: version.major + 1, minor: 0, patch: 0 });
    case "minor":
      return Object.freeze({
        major: version.major,
        minor: version.minor + 1,
        patch: 0,
      });
    case "patch":
      return Object.freeze({
        major: version.major,
        minor: version.minor,
        patch: version.patch + 1,
      });
  }
}

/** Tag prefix shared by all tags of one branch; empty for the plain modes. */
export function tagPrefix(mode: RunMode, fragment: string): string {
  return isBranchMode(mode) ? `${fragment}-` : "";
}

export function tagPattern(
  mode: RunMode,
  fragment: string,
  metaData = "",
): TagPattern {
  return { prefix: tagPrefix(mode, fragment), suffix: metaData };
}

export function composeScmTag(
  mode: RunMode,
  version: SemanticVersion,
  fragment: string,
  metaData = "",
): string {
  return `${tagPrefix(mode, fragment)}${formatTriple(version)}${metaData}`;
}

const RPM_SUFFIX = /-(\d+)$/;

/** `1.4.0-3` -> `3`; fragments without a numeric suffix are release 1. */
export function rpmReleaseNumber(fragment: string): string {
  const match = RPM_SUFFIX.exec(fragment);
  return match ? match[1] : "1";
}

export interface RunModeInput {
  mode: RunMode;
  version: SemanticVersion;
  bump: BumpKind;
  fragment?: string;
  metaData?: string;
}

export function resolveRunMode(input: RunModeInput): Result<VersionBundle> {
  const { mode } = input;
  if (mode === "UNSPECIFIED") {
    return fail(new UnsupportedRunModeError(mode));
  }
  const fragment = input.fragment ?? "";
  if (isBranchMode(mode) && !fragment) {
    return fail(
      new DelegationUnavailableError(
        `Run mode ${mode} needs a branch version, none could be determined`,
      ),
    );
  }
  const metaData = input.metaData ?? "";
  const next = bumpVersion(input.version, input.bump);
  const triple = formatTriple(next);

  const bundle: VersionBundle = {
    DEVELOPMENT: `${triple}-${DEVELOPMENT_QUALIFIER}`,
    RELEASE: triple,
    SCM_TAG: composeScmTag(mode, next, fragment, metaData),
    METADATA: isRpmMode(mode)
      ? `${metaData}+${rpmReleaseNumber(fragment)}`
      : metaData,
    MAJOR: String(next.major),
    MINOR: String(next.minor),
    PATCH: String(next.patch),
  };
  return ok(Object.freeze(bundle));
}
