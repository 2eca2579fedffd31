import { MalformedVersionError } from "../types/errors";
import { fail, ok, type Result } from "../types/result";

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly preRelease?: string;
}

const NUMERIC = /^\d+$/;

/**
 * Parses `major.minor.patch[-qualifier]`, e.g. `1.2.3-SNAPSHOT`.
 * The qualifier is everything after the first hyphen of the patch component.
 */
export function parseVersion(
  raw: string,
): Result<SemanticVersion, MalformedVersionError> {
  const parts = raw.trim().split(".");
  if (parts.length !== 3) {
    return fail(
      new MalformedVersionError(
        `Unrecognized version-pattern "${raw}": expected 3 components, got ${parts.length}`,
        raw,
      ),
    );
  }
  const [majorRaw, minorRaw, patchWithQualifier] = parts;
  const hyphen = patchWithQualifier.indexOf("-");
  const patchRaw =
    hyphen === -1
      ? patchWithQualifier
      : patchWithQualifier.substring(0, hyphen);
  const preRelease =
    hyphen === -1 ? undefined : patchWithQualifier.substring(hyphen + 1);

  for (const component of [majorRaw, minorRaw, patchRaw]) {
    if (!NUMERIC.test(component)) {
      return fail(
        new MalformedVersionError(
          `Unrecognized version-pattern "${raw}": "${component}" is not a non-negative integer`,
          raw,
        ),
      );
    }
    if (!Number.isSafeInteger(Number(component))) {
      return fail(
        new MalformedVersionError(
          `Unrecognized version-pattern "${raw}": "${component}" is too large`,
          raw,
        ),
      );
    }
  }
  if (preRelease !== undefined && preRelease.length === 0) {
    return fail(
      new MalformedVersionError(
        `Unrecognized version-pattern "${raw}": empty qualifier`,
        raw,
      ),
    );
  }

  const version: SemanticVersion = {
    major: Number(majorRaw),
    minor: Number(minorRaw),
    patch: Number(patchRaw),
    ...(preRelease !== undefined ? { preRelease } : {}),
  };
  return ok(Object.freeze(version));
}

export function formatTriple(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareTriples(a: SemanticVersion, b: SemanticVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}
