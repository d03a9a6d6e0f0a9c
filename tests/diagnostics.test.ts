import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { EventEmitter } from "node:events";

import { __resetDiagnosticsForTests, installDiagnostics } from "../src/diagnostics.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("diagnostics hook", () => {
  afterEach(() => {
    __resetDiagnosticsForTests();
    sinon.restore();
  });

  it("registers its monitor only once per process", () => {
    const target = new EventEmitter();
    const onSpy = sinon.spy(target, "on");
    const logger = new RecordingLogger();

    expect(installDiagnostics({ logger, target })).to.equal(true);
    expect(installDiagnostics({ logger, target })).to.equal(false);
    sinon.assert.calledOnce(onSpy);
    sinon.assert.calledWith(onSpy, "uncaughtExceptionMonitor");
  });

  it("logs uncaught errors with their origin", () => {
    const target = new EventEmitter();
    const logger = new RecordingLogger();
    installDiagnostics({ logger, target });

    const failure = new TypeError("  adjacency\nlookup failed ");
    target.emit("uncaughtExceptionMonitor", failure, "uncaughtException");

    expect(logger.entries).to.deep.equal([
      {
        level: "error",
        message: "uncaught_exception",
        payload: {
          origin: "uncaughtException",
          name: "TypeError",
          message: "adjacency lookup failed",
          stack: failure.stack ?? null,
        },
      },
    ]);
  });

  it("describes thrown values that are not errors", () => {
    const target = new EventEmitter();
    const logger = new RecordingLogger();
    installDiagnostics({ logger, target });

    target.emit("uncaughtExceptionMonitor", "plain failure", "unhandledRejection");

    expect(logger.entries[0]?.payload).to.deep.equal({
      origin: "unhandledRejection",
      name: "string",
      message: "plain failure",
      stack: null,
    });
  });
});
