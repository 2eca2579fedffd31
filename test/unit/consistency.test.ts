import { expect } from "chai";
import {
  formatTag,
  highestTag,
  RepositoryConsistencyChecker,
  tripleOf,
} from "../../src/core/consistency";
import type { SemanticVersion } from "../../src/core/version-parser";
import { FakeSourceControl } from "../helpers/fake-scm";

const v = (major: number, minor: number, patch: number): SemanticVersion => ({
  major,
  minor,
  patch,
});

describe("tripleOf", () => {
  it("reads the version between prefix and suffix", () => {
    expect(
      tripleOf("featureX-1.4.2-el8", { prefix: "featureX-", suffix: "-el8" }),
    ).to.deep.equal(v(1, 4, 2));
  });

  it("does not mistake digits in the suffix for the version", () => {
    expect(tripleOf("1.2.0-java17", { suffix: "-java17" })).to.deep.equal(
      v(1, 2, 0),
    );
  });

  it("rejects tags of a longer branch sharing the prefix", () => {
    expect(tripleOf("feature-x-5.0.0", { prefix: "feature-" })).to.equal(
      undefined,
    );
    expect(tripleOf("1.4.0-3-1.2.0", { prefix: "1.4.0-" })).to.equal(
      undefined,
    );
  });

  it("rejects branch tags when no prefix is expected", () => {
    expect(tripleOf("1.4.0-hotfix-2.0.0")).to.equal(undefined);
  });

  it("rejects tags with another metadata suffix", () => {
    expect(tripleOf("1.3.0-solr")).to.equal(undefined);
    expect(tripleOf("1.3.0", { suffix: "-solr" })).to.equal(undefined);
  });
});

describe("highestTag", () => {
  const tags = [
    "1.2.0",
    "1.10.1",
    "1.4.0-hotfix-2.0.0",
    "featureX-2.0.0",
    "featureX-1.0.0",
    "featureX-y-9.0.0",
    "notes",
  ];
  it("compares numerically and ignores branch tags in plain modes", () => {
    expect(highestTag(tags)).to.equal("1.10.1");
  });
  it("only considers tags of the given branch", () => {
    expect(highestTag(tags, { prefix: "featureX-" })).to.equal(
      "featureX-2.0.0",
    );
  });
  it("returns undefined when nothing matches", () => {
    expect(highestTag(tags, { prefix: "other-" })).to.equal(undefined);
  });
});

describe("formatTag", () => {
  it("renders the tag a run mode writes", () => {
    expect(formatTag(v(1, 3, 0), { prefix: "featureX-", suffix: "-solr" }))
      .to.equal("featureX-1.3.0-solr");
  });
});

describe("RepositoryConsistencyChecker", () => {
  it("flags the remote when it already holds the candidate", async () => {
    const checker = new RepositoryConsistencyChecker(
      new FakeSourceControl({ remoteTags: ["1.2.0", "1.3.0"] }),
    );
    expect(await checker.checkRemote(v(1, 3, 0))).to.equal(true);
    expect(await checker.checkRemote(v(1, 3, 1))).to.equal(false);
  });

  it("flags the remote when it is ahead of the candidate", async () => {
    const checker = new RepositoryConsistencyChecker(
      new FakeSourceControl({ remoteTags: ["2.0.0"] }),
    );
    expect(await checker.checkRemote(v(1, 3, 0))).to.equal(true);
  });

  it("lets an older tag with a digit-bearing suffix pass", async () => {
    const checker = new RepositoryConsistencyChecker(
      new FakeSourceControl({ localTags: ["1.2.0-el8"] }),
    );
    expect(await checker.checkLocal(v(1, 3, 0), { suffix: "-el8" })).to.equal(
      false,
    );
    expect(await checker.checkLocal(v(1, 2, 0), { suffix: "-el8" })).to.equal(
      true,
    );
  });

  it("passes an empty repository", async () => {
    const checker = new RepositoryConsistencyChecker(new FakeSourceControl());
    expect(await checker.checkLocal(v(0, 0, 1))).to.equal(false);
    expect(await checker.checkRemote(v(0, 0, 1))).to.equal(false);
  });

  it("scopes branch checks to the branch prefix", async () => {
    const checker = new RepositoryConsistencyChecker(
      new FakeSourceControl({
        localTags: ["5.0.0", "featureX-1.2.0", "featureX-y-7.0.0"],
      }),
    );
    expect(
      await checker.checkLocal(v(1, 3, 0), { prefix: "featureX-" }),
    ).to.equal(false);
  });

  it("reports a verdict with the remote reason first", async () => {
    const checker = new RepositoryConsistencyChecker(
      new FakeSourceControl({ localTags: ["1.3.0"], remoteTags: ["1.3.0"] }),
    );
    expect(
      await checker.verdict(v(1, 3, 0), {}, { remote: true }),
    ).to.deep.equal({
      isLocalCorrupt: true,
      isRemoteCorrupt: true,
      reason: "Remote version is higher than or equal to 1.3.0",
    });
    expect(await checker.verdict(v(1, 3, 0))).to.deep.equal({
      isLocalCorrupt: true,
      isRemoteCorrupt: false,
      reason: "Tag 1.3.0 or a newer one already exists locally",
    });
    expect(await checker.verdict(v(1, 3, 1))).to.deep.equal({
      isLocalCorrupt: false,
      isRemoteCorrupt: false,
    });
  });
});
