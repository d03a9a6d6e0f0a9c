import { describe, it } from "mocha";
import { expect } from "chai";

import {
  GraphDecodeError,
  decodeGraph,
  decodeRelationships,
  encodeCycleDetectionResult,
  encodeGraph,
  encodePathResult,
  encodeTopologicalSortResult,
  parseGraph,
  parseRelationships,
} from "../src/codec.js";
import { ERROR_CODES } from "../src/types.js";

describe("graph codec", () => {
  it("decodes graphs and drops null or missing weights", () => {
    const outcome = decodeGraph(
      JSON.stringify({
        nodes: ["A", "B", "C"],
        edges: [
          { from: "A", to: "B", weight: 1.5 },
          { from: "B", to: "C", weight: null },
          { from: "A", to: "C" },
        ],
        label: "ignored",
      }),
    );
    expect(outcome).to.deep.equal({
      ok: true,
      value: {
        nodes: ["A", "B", "C"],
        edges: [
          { from: "A", to: "B", weight: 1.5 },
          { from: "B", to: "C" },
          { from: "A", to: "C" },
        ],
      },
    });
  });

  it("rejects text that is not JSON", () => {
    const outcome = decodeGraph("{nodes:");
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error).to.be.instanceOf(GraphDecodeError);
      expect(outcome.error.code).to.equal(ERROR_CODES.GRAPH_DECODE_FAILED);
      expect(outcome.error.subject).to.equal("graph");
      expect(outcome.error.issues).to.have.length(1);
      expect(outcome.error.issues[0]?.path).to.equal("");
    }
  });

  it("points at the offending fields of a mistyped payload", () => {
    const outcome = decodeGraph(JSON.stringify({ nodes: ["A", 7], edges: [{ from: "A", to: "B", weight: "heavy" }] }));
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.issues.map((issue) => issue.path)).to.deep.equal(["/nodes/1", "/edges/0/weight"]);
    }
  });

  it("requires both node and edge lists", () => {
    const outcome = decodeGraph(JSON.stringify({ nodes: [] }));
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.issues.map((issue) => issue.path)).to.deep.equal(["/edges"]);
    }
  });

  it("decodes relationship lists with optional confidence", () => {
    const text = JSON.stringify([
      { from: "A", to: "B", confidence: 0.8 },
      { from: "B", to: "C", confidence: null },
      { from: "C", to: "D" },
    ]);
    expect(decodeRelationships(text)).to.deep.equal({
      ok: true,
      value: [{ from: "A", to: "B", confidence: 0.8 }, { from: "B", to: "C" }, { from: "C", to: "D" }],
    });
  });

  it("throws from the strict parsers", () => {
    expect(() => parseGraph("[]")).to.throw(GraphDecodeError, /^graph payload rejected/);
    expect(() => parseRelationships("{}")).to.throw(GraphDecodeError, /^relationships payload rejected/);
    expect(parseRelationships("[]")).to.deep.equal([]);
  });

  it("encodes results with a fixed key order", () => {
    expect(encodeTopologicalSortResult({ hasCycle: false, sorted: ["A"] })).to.equal('{"sorted":["A"],"hasCycle":false}');
    expect(encodeCycleDetectionResult({ cycles: [["A", "B"]], hasCycle: true })).to.equal(
      '{"hasCycle":true,"cycles":[["A","B"]]}',
    );
    expect(encodePathResult({ distance: null, exists: false, path: [] })).to.equal(
      '{"path":[],"exists":false,"distance":null}',
    );
  });

  it("writes absent edge weights as null", () => {
    expect(encodeGraph({ nodes: ["A", "B"], edges: [{ from: "A", to: "B" }, { from: "B", to: "A", weight: 2 }] })).to.equal(
      '{"nodes":["A","B"],"edges":[{"from":"A","to":"B","weight":null},{"from":"B","to":"A","weight":2}]}',
    );
  });
});
