import { describe, it, expect } from "vitest";
import { RoadNetwork } from "../domain/road-network.js";
import { ShortestPathTable } from "./shortest-path-table.js";

function network(): RoadNetwork {
  return RoadNetwork.fromRoads([
    { cityA: "A", cityB: "B", distance: 5 },
    { cityA: "B", cityB: "C", distance: 5 },
    { cityA: "C", cityB: "D", distance: 5 },
    { cityA: "A", cityB: "D", distance: 20 },
    { cityA: "X", cityB: "Y", distance: 1 },
  ]);
}

describe("ShortestPathTable", () => {
  it("runs one search per distinct key point", () => {
    const table = ShortestPathTable.build(network(), ["A", "D", "B", "A"]);
    expect(table.sourcesComputed).toBe(3);
    expect(table.tree("A")?.source).toBe("A");
    expect(table.tree("C")).toBeUndefined();
  });

  it("looks up distances and paths between key points", () => {
    const table = ShortestPathTable.build(network(), ["A", "D"]);

    expect(table.distance("A", "D")).toBe(15);
    expect(table.distance("D", "A")).toBe(15);
    expect(table.path("A", "D")).toEqual(["A", "B", "C", "D"]);
    expect(table.path("D", "A")).toEqual(["D", "C", "B", "A"]);
    expect(table.path("A", "A")).toEqual(["A"]);
  });

  it("reports Infinity and no path for unreachable or unknown pairs", () => {
    const table = ShortestPathTable.build(network(), ["A", "Q"]);

    expect(table.distance("A", "X")).toBe(Infinity);
    expect(table.path("A", "X")).toBeUndefined();
    expect(table.distance("Q", "A")).toBe(Infinity);
    expect(table.path("Q", "A")).toBeUndefined();
    // not a key point
    expect(table.distance("B", "A")).toBe(Infinity);
    expect(table.path("B", "A")).toBeUndefined();
  });
});
