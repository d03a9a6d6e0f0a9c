import { describe, it } from "mocha";
import { expect } from "chai";

import { findPathBetweenNodes } from "../../src/graph/pathFinding.js";
import { chainOf, graphOf } from "../helpers/graphs.js";

describe("path finding", () => {
  it("sums the weights along the path it finds", () => {
    const graph = graphOf(["A", "B", "C"], [["A", "B", 1], ["B", "C", 1]]);
    expect(findPathBetweenNodes(graph, "A", "C")).to.deep.equal({ path: ["A", "B", "C"], exists: true, distance: 2 });
  });

  it("reports unreachable targets", () => {
    const graph = graphOf(["A", "B", "C"], [["A", "B"]]);
    expect(findPathBetweenNodes(graph, "A", "C")).to.deep.equal({ path: [], exists: false, distance: null });
  });

  it("short-circuits when source and target coincide", () => {
    const graph = graphOf(["A", "B"], [["A", "B", 4]]);
    expect(findPathBetweenNodes(graph, "A", "A")).to.deep.equal({ path: ["A"], exists: true, distance: 0 });
    expect(findPathBetweenNodes(graph, "Z", "Z")).to.deep.equal({ path: ["Z"], exists: true, distance: 0 });
  });

  it("prefers fewer hops over a lighter route", () => {
    const graph = graphOf(["A", "B", "C"], [["A", "B", 1], ["B", "C", 1], ["A", "C", 10]]);
    expect(findPathBetweenNodes(graph, "A", "C")).to.deep.equal({ path: ["A", "C"], exists: true, distance: 10 });
  });

  it("counts unweighted edges as one", () => {
    const graph = graphOf(["A", "B", "C", "D"], [["A", "B", 0.5], ["B", "C"], ["C", "D"]]);
    expect(findPathBetweenNodes(graph, "A", "D")).to.deep.equal({
      path: ["A", "B", "C", "D"],
      exists: true,
      distance: 2.5,
    });
  });

  it("keeps the first route discovered among equally short ones", () => {
    const graph = graphOf(["A", "B", "C", "D"], [["A", "B", 3], ["A", "C", 1], ["B", "D", 3], ["C", "D", 1]]);
    expect(findPathBetweenNodes(graph, "A", "D")).to.deep.equal({ path: ["A", "B", "D"], exists: true, distance: 6 });
  });

  it("terminates on cyclic graphs", () => {
    const graph = graphOf(["A", "B", "C"], [["A", "B"], ["B", "A"]]);
    expect(findPathBetweenNodes(graph, "A", "C").exists).to.equal(false);
  });

  it("traverses identities that only appear in edges", () => {
    const graph = graphOf(["A"], [["X", "A", 2]]);
    expect(findPathBetweenNodes(graph, "X", "A")).to.deep.equal({ path: ["X", "A"], exists: true, distance: 2 });
  });

  it("follows edge direction", () => {
    const graph = graphOf(["A", "B"], [["A", "B"]]);
    expect(findPathBetweenNodes(graph, "B", "A").exists).to.equal(false);
  });

  it("walks very long chains in linear memory", () => {
    const result = findPathBetweenNodes(chainOf(50_000), "n0", "n49999");
    expect(result.exists).to.equal(true);
    expect(result.distance).to.equal(49_999);
    expect(result.path).to.have.length(50_000);
    expect(result.path[0]).to.equal("n0");
    expect(result.path[1]).to.equal("n1");
    expect(result.path[49_999]).to.equal("n49999");
  });
});
