#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { loadConfig } from "../core/config";
import { createConsoleLogger } from "../core/logger";
import { resolveVersions } from "../core/orchestrator";
import type { BumpKind } from "../core/run-mode";
import { GitSourceControl } from "../core/scm";
import { ConfigError } from "../types/errors";
import { exitCodeFor } from "./exit-code";

const USAGE =
  "usage: semver-branch-release <major|minor|patch> --current <version> " +
  "[--run-mode MODE] [--branch-version B] [--meta-data D] " +
  "[--conversion-url URL] [--check-remote] " +
  "[--create-tag] [--output FILE]";

const BUMPS: readonly BumpKind[] = ["major", "minor", "patch"];

function parseBump(value: string | undefined): BumpKind {
  const bump = BUMPS.find((b) => b === value);
  if (!bump) throw new ConfigError(USAGE);
  return bump;
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      current: { type: "string" },
      "run-mode": { type: "string" },
      "branch-version": { type: "string" },
      "meta-data": { type: "string" },
      "conversion-url": { type: "string" },
      "check-remote": { type: "boolean" },
      "create-tag": { type: "boolean" },
      output: { type: "string" },
    },
  });
  const bump = parseBump(positionals[0]);
  const currentVersion = values.current ?? process.env["SBR_CURRENT_VERSION"];
  if (!currentVersion) throw new ConfigError(USAGE);

  const log = createConsoleLogger();
  const config = loadConfig(process.env, {
    runMode: values["run-mode"],
    branchVersion: values["branch-version"],
    metaData: values["meta-data"],
    branchConversionUrl: values["conversion-url"],
    checkRemoteVersionTags: values["check-remote"],
  });
  const scm = new GitSourceControl({
    remote: config.remote,
    username: config.scmUsername,
    password: config.scmPassword,
  });

  const outcome = await resolveVersions(
    { currentVersion, bump },
    { config, scm, logger: log },
  );
  if (outcome.status === "failed") {
    log.error("semantic versioning is terminated");
  } else if (outcome.status === "skipped") {
    log.warn(`no version resolved: ${outcome.reason}`);
  } else {
    const json = JSON.stringify(outcome.bundle, null, 2);
    console.log(json);
    if (values.output) writeFileSync(values.output, json + "\n");
    if (values["create-tag"]) {
      await scm.createTag(outcome.bundle.SCM_TAG);
      log.info(`created tag ${outcome.bundle.SCM_TAG}`);
    }
  }
  return exitCodeFor(outcome);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[sbr] failed:", err);
    process.exit(1);
  });
