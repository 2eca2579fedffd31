import { expect } from "chai";
import { loadConfig } from "../../src/core/config";
import { ConfigError } from "../../src/types/errors";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).to.deep.equal({
      runMode: "NATIVE",
      metaData: "",
      mainlineBranch: "master",
      checkRemoteVersionTags: false,
      delegationTimeoutMs: 10000,
      remote: "origin",
    });
    expect(Object.isFrozen(config)).to.equal(true);
  });

  it("reads SBR_* variables", () => {
    const config = loadConfig({
      SBR_RUN_MODE: "RELEASE_BRANCH",
      SBR_BRANCH_VERSION: "featureX",
      SBR_META_DATA: "-solr",
      SBR_BRANCH_CONVERSION_URL: "http://versionizer.test/",
      SBR_CHECK_REMOTE_TAGS: "true",
      SBR_DELEGATION_TIMEOUT_MS: "2500",
      SBR_SCM_USERNAME: "ci",
      SBR_SCM_PASSWORD: "test-secret",
    });
    expect(config.runMode).to.equal("RELEASE_BRANCH");
    expect(config.branchVersion).to.equal("featureX");
    expect(config.metaData).to.equal("-solr");
    expect(config.branchConversionUrl).to.equal("http://versionizer.test/");
    expect(config.checkRemoteVersionTags).to.equal(true);
    expect(config.delegationTimeoutMs).to.equal(2500);
    expect(config.scmUsername).to.equal("ci");
    expect(config.scmPassword).to.equal("test-secret");
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { SBR_RUN_MODE: "RELEASE", SBR_CHECK_REMOTE_TAGS: "yes" },
      { runMode: "NATIVE_BRANCH", checkRemoteVersionTags: false },
    );
    expect(config.runMode).to.equal("NATIVE_BRANCH");
    expect(config.checkRemoteVersionTags).to.equal(false);
  });

  it("keeps an unknown run mode as UNSPECIFIED", () => {
    expect(loadConfig({ SBR_RUN_MODE: "BOGUS" }).runMode).to.equal(
      "UNSPECIFIED",
    );
  });

  it("rejects values it cannot parse", () => {
    expect(() => loadConfig({ SBR_CHECK_REMOTE_TAGS: "maybe" })).to.throw(
      ConfigError,
      'SBR_CHECK_REMOTE_TAGS must be a boolean, got "maybe"',
    );
    expect(() => loadConfig({ SBR_DELEGATION_TIMEOUT_MS: "-5" })).to.throw(
      ConfigError,
    );
  });
});
