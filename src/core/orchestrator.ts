import {
  DelegationUnavailableError,
  DirtyWorkingTreeError,
  LocalVersionCorruptError,
  RemoteVersionCorruptError,
  SemverError,
  UnexpectedError,
  UnrecognizedBranchError,
  UnsupportedRunModeError,
} from "../types/errors";
import {
  classifyBranch,
  fragmentValue,
  type BranchFragment,
  type FetchLike,
} from "./branch-classifier";
import type { ResolverConfig } from "./config";
import { RepositoryConsistencyChecker } from "./consistency";
import { silentLogger, type Logger } from "./logger";
import {
  bumpVersion,
  resolveRunMode,
  tagPattern,
  type BumpKind,
  type VersionBundle,
} from "./run-mode";
import type { SourceControl } from "./scm";
import { parseVersion } from "./version-parser";

export interface ResolveRequest {
  /** Version declared by the project manifest, e.g. `1.2.3-SNAPSHOT`. */
  currentVersion: string;
  bump: BumpKind;
}

export interface ResolveDeps {
  config: ResolverConfig;
  scm: SourceControl;
  fetch?: FetchLike;
  logger?: Logger;
}

export type ResolutionOutcome =
  | { status: "resolved"; bundle: VersionBundle; fragment: BranchFragment }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: SemverError };

/**
 * One resolution pass: clean tree, parse, classify branch, consistency
 * checks, run mode. The first failing step ends the pass.
 */
export async function resolveVersions(
  request: ResolveRequest,
  deps: ResolveDeps,
): Promise<ResolutionOutcome> {
  const log = deps.logger ?? silentLogger;
  try {
    return await runPass(request, deps, log);
  } catch (err: unknown) {
    if (err instanceof SemverError) return failed(err, log);
    const message = err instanceof Error ? err.message : String(err);
    return failed(new UnexpectedError(`Resolution aborted: ${message}`), log);
  }
}

async function runPass(
  request: ResolveRequest,
  deps: ResolveDeps,
  log: Logger,
): Promise<ResolutionOutcome> {
  const { config, scm } = deps;
  log.info(`Semver-goal: ${request.bump.toUpperCase()}`);
  log.info(`Run-mode: ${config.runMode}`);
  log.info(`Version from manifest: ${request.currentVersion}`);

  if (await scm.isWorkingTreeChanged()) {
    return failed(new DirtyWorkingTreeError(), log);
  }

  const parsed = parseVersion(request.currentVersion);
  if (!parsed.ok) return failed(parsed.error, log);
  const version = parsed.value;

  const branch = config.branchVersion ? "" : await scm.getCurrentBranch();
  const fragment = await classifyBranch(branch, {
    explicitOverride: config.branchVersion,
    mainlineBranch: config.mainlineBranch,
    branchConversionUrl: config.branchConversionUrl,
    timeoutMs: config.delegationTimeoutMs,
    fetch: deps.fetch,
    logger: log,
  });
  switch (fragment.kind) {
    case "ignored":
      log.warn(
        `Branch ${fragment.branch} is not a release branch, nothing to resolve`,
      );
      return { status: "skipped", reason: `branch ${fragment.branch} ignored` };
    case "unrecognized":
      return failed(new UnrecognizedBranchError(fragment.branch), log);
    case "delegated":
      if (!fragment.value) {
        return failed(
          new DelegationUnavailableError(
            "Branch conversion service gave no version for " +
              config.mainlineBranch,
          ),
          log,
        );
      }
      break;
    case "explicit":
    case "legacy":
      break;
  }
  const branchVersion = fragmentValue(fragment) ?? "";

  if (config.runMode === "UNSPECIFIED") {
    return failed(new UnsupportedRunModeError(config.runMode), log);
  }

  const pattern = tagPattern(config.runMode, branchVersion, config.metaData);
  const verdict = await new RepositoryConsistencyChecker(scm).verdict(
    bumpVersion(version, request.bump),
    pattern,
    { remote: config.checkRemoteVersionTags },
  );
  if (verdict.isRemoteCorrupt) {
    const reason = verdict.reason ?? "Remote version is ahead";
    return failed(
      new RemoteVersionCorruptError(`${reason}, check your repository state`),
      log,
    );
  }

  const resolved = resolveRunMode({
    mode: config.runMode,
    version,
    bump: request.bump,
    fragment: branchVersion,
    metaData: config.metaData,
  });
  if (!resolved.ok) return failed(resolved.error, log);
  const bundle = resolved.value;

  if (verdict.isLocalCorrupt) {
    return failed(
      new LocalVersionCorruptError(
        verdict.reason ?? `Tag ${bundle.SCM_TAG} already exists locally`,
      ),
      log,
    );
  }

  log.info(`New DEVELOPMENT-version: ${bundle.DEVELOPMENT}`);
  log.info(`New SCM-tag: ${bundle.SCM_TAG}`);
  log.info(`New RELEASE-version: ${bundle.RELEASE}`);
  return { status: "resolved", bundle, fragment };
}

function failed(error: SemverError, log: Logger): ResolutionOutcome {
  log.error(`${error.name}: ${error.message}`);
  return { status: "failed", error };
}
