import { describe, expect, it } from "vitest";
import { buildOrderGraph, normalizeTheta, parseNodesInput, validateNodes } from "../src/core/node-parser";

function parseError(text: string): string {
  try {
    parseNodesInput(text);
  } catch (err) {
    if (err instanceof Error) return err.message;
    throw err;
  }
  throw new Error("expected parseNodesInput to throw");
}

describe("parseNodesInput", () => {
  it("parses one node per line and skips blank lines", () => {
    const points = parseNodesInput("  dock, 0, 0, 0\n\nshelf-a,12.5,-3,1.57\r\n");
    expect(points).toEqual([
      { nodeId: "dock", x: 0, y: 0, theta: 0, line: 1 },
      { nodeId: "shelf-a", x: 12.5, y: -3, theta: 1.57, line: 3 }
    ]);
  });

  it("normalises theta into [-pi, pi]", () => {
    const [point] = parseNodesInput("a,0,0,4");
    expect(point.theta).toBeCloseTo(4 - 2 * Math.PI, 10);
    expect(normalizeTheta(-7)).toBeCloseTo(-7 + 2 * Math.PI, 10);
    expect(normalizeTheta(Math.PI)).toBe(Math.PI);
  });

  it.each([
    ["", "Empty nodes input"],
    ["   \n  ", "Empty nodes input"],
    ["n1,0,0", "Line 1: expected 4 values (nodeId,x,y,theta), got 3"],
    ["a,0,0,0\n\nb,1", "Line 3: expected 4 values (nodeId,x,y,theta), got 2"],
    [",0,0,0", "Line 1: node id cannot be empty"],
    ["n1,abc,0,0", "Line 1: invalid number format"],
    ["n1,,0,0", "Line 1: invalid number format"],
    ["n1,0,0,Infinity", "Line 1: invalid number format"],
    ["n1,1000.5,0,0", "Line 1: coordinates exceed ±1000m"],
    ["n1,0,-1001,0", "Line 1: coordinates exceed ±1000m"],
    ["a,0,0,0\nb,1,1,0\na,2,2,0\nb,3,3,0", "Duplicate node IDs found: a, b"]
  ])("rejects %j", (text, message) => {
    expect(parseError(text)).toBe(message);
  });

  it("accepts coordinates on the boundary", () => {
    expect(parseNodesInput("edge,1000,-1000,0")[0]).toMatchObject({ x: 1000, y: -1000 });
  });
});

describe("validateNodes", () => {
  it("flags empty and oversized routes", () => {
    expect(validateNodes([])).toEqual(["No nodes provided"]);
    const points = parseNodesInput("a,0,0,0\nb,1,0,0\nc,2,0,0");
    expect(validateNodes(points, 2)).toEqual(["Too many nodes: 3 (maximum: 2)"]);
  });

  it("warns about consecutive nodes closer than 10cm", () => {
    const points = parseNodesInput("a,0,0,0\nb,0.03,0.04,0\nc,5,5,0");
    expect(validateNodes(points)).toEqual(["Nodes 'a' and 'b' are very close (0.05m)"]);
  });

  it("returns nothing for a sane route", () => {
    expect(validateNodes(parseNodesInput("a,0,0,0\nb,1,0,0"))).toEqual([]);
  });
});

describe("buildOrderGraph", () => {
  it("puts nodes on even and edges on odd sequence ids", () => {
    const graph = buildOrderGraph(parseNodesInput("a,0,0,0\nb,2,0,1.5"), "hall-a");

    expect(graph.nodes).toEqual([
      { nodeId: "a", sequenceId: 0, released: true, nodePosition: { x: 0, y: 0, theta: 0, mapId: "hall-a" }, actions: [] },
      { nodeId: "b", sequenceId: 2, released: true, nodePosition: { x: 2, y: 0, theta: 1.5, mapId: "hall-a" }, actions: [] }
    ]);
    expect(graph.edges).toEqual([
      { edgeId: "a--b", sequenceId: 1, released: true, startNodeId: "a", endNodeId: "b", actions: [] }
    ]);
  });
});
