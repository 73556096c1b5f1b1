import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { rm } from "node:fs/promises";
import { join } from "node:path";

import { loadResultFile } from "../../src/statistics/loader.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { createWorkspace, writeResultFile } from "../helpers/resultFiles.js";

describe("statistics/loader", () => {
  let workingDir: string;

  beforeEach(async () => {
    workingDir = await createWorkspace("stats-loader-");
  });

  afterEach(async () => {
    await rm(workingDir, { recursive: true, force: true });
  });

  it("decodes JSON documents without validating their sections", async () => {
    const path = await writeResultFile(workingDir, "other.json", { hello: "world" });

    const outcome = await loadResultFile(path, new RecordingLogger());

    expect(outcome).to.deep.equal({ status: "loaded", path, document: { hello: "world" } });
  });

  it("turns undecodable content into a skip", async () => {
    const logger = new RecordingLogger();
    const path = await writeResultFile(workingDir, "notes.txt", "not json");

    const outcome = await loadResultFile(path, logger);

    expect(outcome.status).to.equal("skipped");
    if (outcome.status === "skipped") {
      expect(outcome.reason).to.equal("invalid_json");
      expect(outcome.detail).to.be.a("string").and.not.equal("");
    }
    expect(logger.messages("debug")).to.deep.equal(["result_file_skipped"]);
  });

  it("propagates filesystem errors", async () => {
    const missing = join(workingDir, "missing.json");

    let caught: unknown;
    try {
      await loadResultFile(missing, new RecordingLogger());
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(caught).to.have.property("code", "ENOENT");
  });
});
