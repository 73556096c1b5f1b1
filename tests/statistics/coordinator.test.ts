import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";

import { RunCatalogue, runCatalogueFactory } from "../../src/statistics/catalogue.js";
import { ExperimentRunCoordinator } from "../../src/statistics/coordinator.js";
import type { ResultSourceSelection } from "../../src/statistics/enumerator.js";
import {
  ExperimentTypeMismatchError,
  UnrecognisedExperimentTypeError,
  UnsupportedExperimentTypeError,
} from "../../src/statistics/errors.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { createWorkspace, mininetParams, mininetRuns, writeResultFile } from "../helpers/resultFiles.js";

function coordinatorFor(selection: ResultSourceSelection, logger = new RecordingLogger()) {
  return new ExperimentRunCoordinator({ selection, aggregatorFactory: runCatalogueFactory, logger, sortEntries: true });
}

/** Coordinator remembering every file handed to the per-file hook. */
class ProvenanceCoordinator extends ExperimentRunCoordinator<RunCatalogue> {
  public readonly recorded: string[] = [];

  protected override recordStats(_aggregate: RunCatalogue, path: string): void {
    this.recorded.push(path);
  }
}

describe("statistics/coordinator", () => {
  let workingDir: string;

  beforeEach(async () => {
    workingDir = await createWorkspace("stats-coord-");
  });

  afterEach(async () => {
    sinon.restore();
    await rm(workingDir, { recursive: true, force: true });
  });

  it("ignores in-progress files when parsing a directory", async () => {
    const results = await writeResultFile(workingDir, "results.json", { params: mininetParams(), results: mininetRuns(2) });
    await writeResultFile(workingDir, "partial.progress", {
      params: mininetParams(),
      results: mininetRuns(1, "in-flight/run"),
    });

    const outcome = await coordinatorFor({ mode: "dirs", dirs: [workingDir] }).run();

    expect(outcome.parsedFiles).to.deep.equal([results]);
    expect(outcome.skippedFiles).to.deep.equal([]);
    expect(outcome.aggregate?.runs().map((run) => run.outputsDir)).to.deep.equal([
      join(workingDir, "outputs", "run0"),
      join(workingDir, "outputs", "run1"),
    ]);
  });

  it("skips undecodable files and keeps merging the following ones", async () => {
    const logger = new RecordingLogger();
    const broken = await writeResultFile(workingDir, "a-notes.txt", "not json");
    const results = await writeResultFile(workingDir, "b-results.json", { params: mininetParams(), results: mininetRuns(1) });

    const outcome = await coordinatorFor({ mode: "dirs", dirs: [workingDir] }, logger).run();

    expect(outcome.parsedFiles).to.deep.equal([results]);
    expect(outcome.skippedFiles.map(({ path, reason }) => ({ path, reason }))).to.deep.equal([
      { path: broken, reason: "invalid_json" },
    ]);
    expect(outcome.aggregate).to.be.instanceOf(RunCatalogue);
    expect(outcome.aggregate?.runs()).to.have.length(1);
    expect(logger.messages("debug")).to.include("result_file_skipped");
  });

  it("skips JSON documents lacking params or results", async () => {
    const incomplete = await writeResultFile(workingDir, "summary.json", { params: mininetParams() });
    const wrongShape = await writeResultFile(workingDir, "table.json", { params: [], results: [] });

    const outcome = await coordinatorFor({ mode: "files", files: [incomplete, wrongShape] }).run();

    expect(outcome.aggregate).to.equal(null);
    expect(outcome.experimentType).to.equal(null);
    expect(outcome.skippedFiles.map((file) => file.reason)).to.deep.equal(["missing_sections", "missing_sections"]);
  });

  it("accumulates every directory into one aggregate", async () => {
    const first = join(workingDir, "first");
    const second = join(workingDir, "second");
    await mkdir(first);
    await mkdir(second);
    await writeResultFile(first, "results.json", { params: mininetParams(), results: mininetRuns(2) });
    await writeResultFile(second, "results.json", {
      params: mininetParams({ failure_model: "uniform/0.2" }),
      results: mininetRuns(1),
    });
    const createSpy = sinon.spy(runCatalogueFactory, "create");

    const coordinator = coordinatorFor({ mode: "dirs", dirs: [first, second] });
    const outcome = await coordinator.run();

    expect(createSpy.callCount).to.equal(1);
    expect(outcome.aggregate).to.equal(coordinator.stats);
    expect(outcome.aggregate?.batchCount).to.equal(2);
    expect(outcome.aggregate?.groups().map((group) => [group.parameters.fprob, group.outputsDirs.length])).to.deep.equal([
      [0.1, 2],
      [0.2, 1],
    ]);
    expect(outcome.experimentType).to.deep.equal({ kind: "mininet" });
  });

  it("leaves the aggregate absent when nothing was found", async () => {
    const outcome = await coordinatorFor({ mode: "dirs", dirs: [workingDir] }).run();

    expect(outcome).to.deep.equal({ aggregate: null, experimentType: null, parsedFiles: [], skippedFiles: [] });
  });

  it("aborts on an unrecognised experiment type before extracting anything", async () => {
    const file = await writeResultFile(workingDir, "results.json", {
      params: mininetParams({ experiment_type: "quantum" }),
      results: mininetRuns(1),
    });
    const createSpy = sinon.spy(runCatalogueFactory, "create");
    const coordinator = coordinatorFor({ mode: "files", files: [file] });

    let caught: unknown;
    try {
      await coordinator.run();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(UnrecognisedExperimentTypeError);
    expect(createSpy.callCount).to.equal(0);
    expect(coordinator.stats).to.equal(null);
  });

  it("treats legacy files without an experiment type as unsupported networkx results", async () => {
    const params = mininetParams();
    delete params.experiment_type;
    const file = await writeResultFile(workingDir, "legacy.json", { params, results: [] });
    const coordinator = coordinatorFor({ mode: "files", files: [file] });

    let caught: unknown;
    try {
      await coordinator.run();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(UnsupportedExperimentTypeError);
    expect(coordinator.observedExperimentType).to.deep.equal({ kind: "networkx" });
  });

  it("aborts on an explicit null experiment type", async () => {
    const file = await writeResultFile(workingDir, "results.json", {
      params: mininetParams({ experiment_type: null }),
      results: mininetRuns(1),
    });
    const coordinator = coordinatorFor({ mode: "files", files: [file] });

    let caught: unknown;
    try {
      await coordinator.run();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(UnrecognisedExperimentTypeError);
    expect(caught).to.have.property("experimentType", "null");
    expect(coordinator.stats).to.equal(null);
  });

  it("refuses to mix experiment types within one run", async () => {
    const mininet = await writeResultFile(workingDir, "a.json", { params: mininetParams(), results: mininetRuns(1) });
    const networkx = await writeResultFile(workingDir, "b.json", {
      params: mininetParams({ experiment_type: "networkx" }),
      results: [],
    });

    let caught: unknown;
    try {
      await coordinatorFor({ mode: "files", files: [mininet, networkx] }).run();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(ExperimentTypeMismatchError);
    expect(caught).to.have.property("details").that.deep.equals({
      expected: "mininet",
      received: "networkx",
      path: networkx,
    });
  });

  it("invokes the per-file hook once for every merged file", async () => {
    const a = await writeResultFile(workingDir, "a.json", { params: mininetParams(), results: mininetRuns(1) });
    await writeResultFile(workingDir, "b.txt", "garbage");
    const c = await writeResultFile(workingDir, "c.json", { params: mininetParams(), results: mininetRuns(1) });
    const coordinator = new ProvenanceCoordinator({
      selection: { mode: "dirs", dirs: [workingDir] },
      aggregatorFactory: runCatalogueFactory,
      logger: new RecordingLogger(),
      sortEntries: true,
    });

    await coordinator.run();

    expect(coordinator.recorded).to.deep.equal([a, c]);
  });
});
