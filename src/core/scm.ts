import { execFileSync } from "node:child_process";
import { highestTag, type TagPattern } from "./consistency";

/** Source-control collaborator; tag queries see tags matching `pattern`. */
export interface SourceControl {
  getCurrentBranch(): Promise<string>;
  isWorkingTreeChanged(): Promise<boolean>;
  highestLocalTag(pattern?: TagPattern): Promise<string | undefined>;
  highestRemoteTag(pattern?: TagPattern): Promise<string | undefined>;
  createTag(name: string): Promise<void>;
}

export type GitRunner = (args: string[]) => string;

export interface GitSourceControlOptions {
  cwd?: string;
  remote?: string;
  username?: string;
  password?: string;
  run?: GitRunner;
}

export class GitSourceControl implements SourceControl {
  private readonly remote: string;
  private readonly run: GitRunner;

  constructor(private readonly opts: GitSourceControlOptions = {}) {
    const cwd = opts.cwd || process.cwd();
    this.remote = opts.remote || "origin";
    this.run = opts.run ?? ((args) => git(cwd, args));
  }

  async getCurrentBranch(): Promise<string> {
    const branch = this.run(["rev-parse", "--abbrev-ref", "HEAD"]).trim();
    // detached HEAD: report the commit hash, as CI checkouts do
    if (branch === "HEAD") return this.run(["rev-parse", "HEAD"]).trim();
    return branch;
  }

  async isWorkingTreeChanged(): Promise<boolean> {
    return this.run(["status", "--porcelain"]).trim().length > 0;
  }

  async highestLocalTag(
    pattern: TagPattern = {},
  ): Promise<string | undefined> {
    return highestTag(lines(this.run(["tag", "--list"])), pattern);
  }

  async highestRemoteTag(
    pattern: TagPattern = {},
  ): Promise<string | undefined> {
    const output = this.run(["ls-remote", "--tags", this.remoteTarget()]);
    const tags = lines(output)
      .map((line) => line.split("\t")[1] ?? "")
      .filter((ref) => ref.startsWith("refs/tags/"))
      .map((ref) => ref.substring("refs/tags/".length).replace(/\^\{\}$/, ""));
    return highestTag([...new Set(tags)], pattern);
  }

  async createTag(name: string): Promise<void> {
    this.run(["tag", "-a", name, "-m", `Release ${name}`]);
    this.run(["push", this.remoteTarget(), `refs/tags/${name}`]);
  }

  /** Remote name, or its https url carrying the configured credentials. */
  private remoteTarget(): string {
    const { username, password } = this.opts;
    if (!username) return this.remote;
    const raw = this.run(["remote", "get-url", this.remote]).trim();
    if (!raw.startsWith("https://")) return this.remote;
    const url = new URL(raw);
    url.username = username;
    if (password) url.password = password;
    return url.toString();
  }
}

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}

function git(cwd: string, args: string[]): string {
  return execFileSync("git", args, {
    cwd,
    stdio: ["ignore", "pipe", "pipe"],
  }).toString();
}
