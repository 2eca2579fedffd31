import { ConfigError } from "../types/errors";
import {
  DEFAULT_DELEGATION_TIMEOUT_MS,
  DEFAULT_MAINLINE_BRANCH,
} from "./branch-classifier";
import { parseRunMode, type RunMode } from "./run-mode";

export interface ResolverConfig {
  readonly runMode: RunMode;
  /** Used verbatim as branch fragment instead of inspecting the branch. */
  readonly branchVersion?: string;
  /** Appended to the SCM tag, e.g. "-solr". */
  readonly metaData: string;
  readonly branchConversionUrl?: string;
  readonly mainlineBranch: string;
  readonly checkRemoteVersionTags: boolean;
  readonly delegationTimeoutMs: number;
  readonly remote: string;
  readonly scmUsername?: string;
  readonly scmPassword?: string;
}

export interface ConfigOverrides {
  runMode?: string;
  branchVersion?: string;
  metaData?: string;
  branchConversionUrl?: string;
  mainlineBranch?: string;
  checkRemoteVersionTags?: boolean;
  delegationTimeoutMs?: number;
  remote?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the configuration for one resolution pass from SBR_* environment
 * variables, with explicit overrides (CLI flags) taking precedence.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
): ResolverConfig {
  const branchVersion =
    overrides.branchVersion ?? nonEmpty(env["SBR_BRANCH_VERSION"]);
  const branchConversionUrl =
    overrides.branchConversionUrl ??
    nonEmpty(env["SBR_BRANCH_CONVERSION_URL"]);
  const scmUsername = nonEmpty(env["SBR_SCM_USERNAME"]);
  const scmPassword = nonEmpty(env["SBR_SCM_PASSWORD"]);
  const config: ResolverConfig = {
    runMode: parseRunMode(overrides.runMode ?? nonEmpty(env["SBR_RUN_MODE"])),
    metaData: overrides.metaData ?? env["SBR_META_DATA"] ?? "",
    mainlineBranch:
      overrides.mainlineBranch ??
      nonEmpty(env["SBR_MAINLINE_BRANCH"]) ??
      DEFAULT_MAINLINE_BRANCH,
    checkRemoteVersionTags:
      overrides.checkRemoteVersionTags ??
      parseBoolean("SBR_CHECK_REMOTE_TAGS", env["SBR_CHECK_REMOTE_TAGS"]),
    delegationTimeoutMs:
      overrides.delegationTimeoutMs ??
      parseTimeout(env["SBR_DELEGATION_TIMEOUT_MS"]),
    remote: overrides.remote ?? nonEmpty(env["SBR_REMOTE"]) ?? "origin",
    ...(branchVersion ? { branchVersion } : {}),
    ...(branchConversionUrl ? { branchConversionUrl } : {}),
    ...(scmUsername ? { scmUsername } : {}),
    ...(scmPassword ? { scmPassword } : {}),
  };
  return Object.freeze(config);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function parseBoolean(name: string, value: string | undefined): boolean {
  const v = nonEmpty(value)?.toLowerCase();
  if (v === undefined) return false;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function parseTimeout(value: string | undefined): number {
  const v = nonEmpty(value);
  if (v === undefined) return DEFAULT_DELEGATION_TIMEOUT_MS;
  const ms = Number(v);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigError(
      `SBR_DELEGATION_TIMEOUT_MS must be a positive integer, got "${value}"`,
    );
  }
  return ms;
}
