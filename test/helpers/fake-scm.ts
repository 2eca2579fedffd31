import { highestTag, type TagPattern } from "../../src/core/consistency";
import type { SourceControl } from "../../src/core/scm";

export interface FakeScmState {
  branch?: string;
  dirty?: boolean;
  localTags?: string[];
  remoteTags?: string[];
}

export class FakeSourceControl implements SourceControl {
  readonly created: string[] = [];
  branchQueries = 0;

  constructor(private readonly state: FakeScmState = {}) {}

  async getCurrentBranch(): Promise<string> {
    this.branchQueries++;
    return this.state.branch ?? "1.0.0";
  }
  async isWorkingTreeChanged(): Promise<boolean> {
    return this.state.dirty ?? false;
  }
  async highestLocalTag(
    pattern: TagPattern = {},
  ): Promise<string | undefined> {
    return highestTag(this.state.localTags ?? [], pattern);
  }
  async highestRemoteTag(
    pattern: TagPattern = {},
  ): Promise<string | undefined> {
    return highestTag(this.state.remoteTags ?? [], pattern);
  }
  async createTag(name: string): Promise<void> {
    this.created.push(name);
  }
}
