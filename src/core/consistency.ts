import type { SourceControl } from "./scm";
import {
  compareTriples,
  formatTriple,
  parseVersion,
  type SemanticVersion,
} from "./version-parser";

export interface ConsistencyVerdict {
  isLocalCorrupt: boolean;
  isRemoteCorrupt: boolean;
  reason?: string;
}

/** Tags written by one run mode look like `{prefix}M.m.p{suffix}`. */
export interface TagPattern {
  prefix?: string;
  suffix?: string;
}

const BARE_TRIPLE = /^\d+\.\d+\.\d+$/;

/**
 * Release version carried by `tag`, or undefined when the tag was not
 * written under `pattern` (another branch, another metadata suffix).
 */
export function tripleOf(
  tag: string,
  pattern: TagPattern = {},
): SemanticVersion | undefined {
  const prefix = pattern.prefix ?? "";
  const suffix = pattern.suffix ?? "";
  if (
    tag.length < prefix.length + suffix.length ||
    !tag.startsWith(prefix) ||
    !tag.endsWith(suffix)
  ) {
    return undefined;
  }
  const core = tag.substring(prefix.length, tag.length - suffix.length);
  if (!BARE_TRIPLE.test(core)) return undefined;
  const parsed = parseVersion(core);
  return parsed.ok ? parsed.value : undefined;
}

export function formatTag(
  version: SemanticVersion,
  pattern: TagPattern = {},
): string {
  const { prefix = "", suffix = "" } = pattern;
  return `${prefix}${formatTriple(version)}${suffix}`;
}

export function highestTag(
  tags: readonly string[],
  pattern: TagPattern = {},
): string | undefined {
  let highest: { tag: string; version: SemanticVersion } | undefined;
  for (const tag of tags) {
    const version = tripleOf(tag, pattern);
    if (!version) continue;
    if (!highest || compareTriples(version, highest.version) > 0) {
      highest = { tag, version };
    }
  }
  return highest?.tag;
}

function isNotBehind(
  existing: string | undefined,
  candidate: SemanticVersion,
  pattern: TagPattern,
): boolean {
  if (existing === undefined) return false;
  const version = tripleOf(existing, pattern);
  return version !== undefined && compareTriples(version, candidate) >= 0;
}

export class RepositoryConsistencyChecker {
  constructor(private readonly scm: SourceControl) {}

  /** True when the local tags already hold the candidate or a newer one. */
  async checkLocal(
    candidate: SemanticVersion,
    pattern: TagPattern = {},
  ): Promise<boolean> {
    const highest = await this.scm.highestLocalTag(pattern);
    return isNotBehind(highest, candidate, pattern);
  }

  /** True when the remote already holds the candidate or something newer. */
  async checkRemote(
    candidate: SemanticVersion,
    pattern: TagPattern = {},
  ): Promise<boolean> {
    const highest = await this.scm.highestRemoteTag(pattern);
    return isNotBehind(highest, candidate, pattern);
  }

  async verdict(
    candidate: SemanticVersion,
    pattern: TagPattern = {},
    opts: { remote?: boolean } = {},
  ): Promise<ConsistencyVerdict> {
    const isRemoteCorrupt = opts.remote
      ? await this.checkRemote(candidate, pattern)
      : false;
    const isLocalCorrupt = await this.checkLocal(candidate, pattern);
    const tag = formatTag(candidate, pattern);
    let reason: string | undefined;
    if (isRemoteCorrupt) {
      reason = `Remote version is higher than or equal to ${tag}`;
    } else if (isLocalCorrupt) {
      reason = `Tag ${tag} or a newer one already exists locally`;
    }
    return { isLocalCorrupt, isRemoteCorrupt, ...(reason ? { reason } : {}) };
  }
}
