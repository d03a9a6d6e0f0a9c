import { describe, it } from "mocha";
import { expect } from "chai";

import { buildAdjacency, neighborsOf } from "../../src/graph/adjacency.js";
import { graphOf } from "../helpers/graphs.js";

describe("adjacency lookup", () => {
  it("creates an entry for every declared node and keeps edge order", () => {
    const graph = graphOf(["A", "B", "C"], [["A", "C"], ["A", "B", 2]]);
    const adjacency = buildAdjacency(graph);

    expect([...adjacency.keys()]).to.deep.equal(["A", "B", "C"]);
    expect(adjacency.get("A")).to.deep.equal([
      { to: "C", weight: undefined },
      { to: "B", weight: 2 },
    ]);
    expect(adjacency.get("B")).to.deep.equal([]);
  });

  it("registers edge sources that are missing from the node list", () => {
    const adjacency = buildAdjacency(graphOf(["A"], [["X", "A"]]));
    expect([...adjacency.keys()]).to.deep.equal(["A", "X"]);
    expect(adjacency.get("X")).to.deep.equal([{ to: "A", weight: undefined }]);
  });

  it("substitutes the default weight on unweighted edges only", () => {
    const adjacency = buildAdjacency(graphOf(["A", "B", "C"], [["A", "B"], ["A", "C", 0.25]]), 1);
    expect(neighborsOf(adjacency, "A")).to.deep.equal([
      { to: "B", weight: 1 },
      { to: "C", weight: 0.25 },
    ]);
  });

  it("resolves unknown identities to an empty neighbor list", () => {
    const adjacency = buildAdjacency(graphOf(["A"]));
    expect(neighborsOf(adjacency, "missing")).to.deep.equal([]);
  });
});
