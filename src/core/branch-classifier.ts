import { silentLogger, type Logger } from "./logger";

export type BranchFragment =
  | { kind: "explicit"; value: string }
  | { kind: "legacy"; value: string }
  | { kind: "delegated"; value: string }
  | { kind: "ignored"; branch: string }
  | { kind: "unrecognized"; branch: string };

export type FetchLike = (
  input: string,
  init: {
    method: string;
    headers: Record<string, string>;
    signal?: AbortSignal;
  },
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface ClassifyOptions {
  /** Branch version from configuration; skips branch inspection when set. */
  explicitOverride?: string;
  mainlineBranch?: string;
  branchConversionUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export const DEFAULT_MAINLINE_BRANCH = "master";
export const DEFAULT_DELEGATION_TIMEOUT_MS = 10_000;

const EXPLICIT_PATTERN = /^\d+\.\d+\.\d+.*/;
const LEGACY_PATTERN = /^v\d+_\d+_\d+.*/;
// CI checkouts on a detached HEAD report the commit hash as branch name
const HASH_PATTERN = /^[a-z0-9]*$/;

/**
 * Maps a branch name onto the fragment used to qualify release tags.
 * Rules are tried in order and the first match wins.
 */
export async function classifyBranch(
  branchName: string,
  opts: ClassifyOptions = {},
): Promise<BranchFragment> {
  const log = opts.logger ?? silentLogger;
  if (opts.explicitOverride) {
    return { kind: "explicit", value: opts.explicitOverride };
  }
  log.info(`Current branch: ${branchName}`);
  if (!branchName) {
    return { kind: "unrecognized", branch: branchName };
  }
  if (EXPLICIT_PATTERN.test(branchName)) {
    return { kind: "explicit", value: branchName };
  }
  if (LEGACY_PATTERN.test(branchName)) {
    return { kind: "legacy", value: decodeLegacyBranch(branchName) };
  }
  if (branchName === (opts.mainlineBranch ?? DEFAULT_MAINLINE_BRANCH)) {
    return {
      kind: "delegated",
      value: await fetchBranchVersion(branchName, opts, log),
    };
  }
  if (HASH_PATTERN.test(branchName)) {
    log.warn(
      `Branch ${branchName} looks like a commit hash; assuming a test run`,
    );
    return { kind: "ignored", branch: branchName };
  }
  return { kind: "unrecognized", branch: branchName };
}

/** `v1_4_0_extra` -> `1.4.0` */
export function decodeLegacyBranch(branchName: string): string {
  const dotted = branchName.replace(/v/g, "").replace(/_/g, ".");
  const segments = dotted.split(".");
  return segments.length > 3 ? segments.slice(0, 3).join(".") : dotted;
}

async function fetchBranchVersion(
  branch: string,
  opts: ClassifyOptions,
  log: Logger,
): Promise<string> {
  if (!opts.branchConversionUrl) {
    log.error(`No branch conversion url configured for branch ${branch}`);
    return "";
  }
  const url = opts.branchConversionUrl + branch;
  const doFetch: FetchLike = opts.fetch ?? fetch;
  log.info(`Requesting branch version from ${url}`);
  try {
    const res = await doFetch(url, {
      method: "GET",
      headers: { "Content-Type": "application/json" },
      signal: AbortSignal.timeout(
        opts.timeoutMs ?? DEFAULT_DELEGATION_TIMEOUT_MS,
      ),
    });
    if (!res.ok) {
      log.error(`Branch conversion service answered ${res.status}`);
      return "";
    }
    const body = (await res.text()).trim();
    if (body) log.info(`Branch conversion service returned ${body}`);
    else log.error("No branch version could be determined");
    return body;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Could not reach branch conversion service: ${message}`);
    return "";
  }
}

export function fragmentValue(fragment: BranchFragment): string | undefined {
  switch (fragment.kind) {
    case "explicit":
    case "legacy":
    case "delegated":
      return fragment.value;
    case "ignored":
    case "unrecognized":
      return undefined;
  }
}
