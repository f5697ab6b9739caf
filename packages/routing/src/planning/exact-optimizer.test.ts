import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { RoadNetwork } from "../domain/road-network.js";
import { ShortestPathTable } from "./shortest-path-table.js";
import { planExact } from "./exact-optimizer.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Q --2-- S --1-- P --9-- T
 *
 * Visiting Q first costs 2 + 3 + 9 = 14; a greedy P-first order costs 16.
 */
function lineNetwork(): RoadNetwork {
  return RoadNetwork.fromRoads([
    { cityA: "S", cityB: "P", distance: 1 },
    { cityA: "S", cityB: "Q", distance: 2 },
    { cityA: "P", cityB: "T", distance: 9 },
  ]);
}

/** S, X, Y and T where both waypoint orders cost 3 */
function tiedNetwork(): RoadNetwork {
  return RoadNetwork.fromRoads([
    { cityA: "S", cityB: "X", distance: 1 },
    { cityA: "S", cityB: "Y", distance: 1 },
    { cityA: "X", cityB: "Y", distance: 1 },
    { cityA: "X", cityB: "T", distance: 1 },
    { cityA: "Y", cityB: "T", distance: 1 },
  ]);
}

function table(network: RoadNetwork, keyPoints: string[]): ShortestPathTable {
  return ShortestPathTable.build(network, keyPoints);
}

describe("planExact", () => {
  it("finds the ordering the greedy planner misses", () => {
    const t = table(lineNetwork(), ["S", "T", "P", "Q"]);
    const result = planExact(t, "S", "T", ["P", "Q"]);

    expect(result).toEqual({
      kind: "route",
      path: ["S", "Q", "S", "P", "T"],
      totalDistance: 14,
      visitOrder: ["Q", "P"],
    });
  });

  it("keeps the first ordering enumerated when totals tie", () => {
    const network = tiedNetwork();
    const t = table(network, ["S", "T", "X", "Y"]);

    const xy = planExact(t, "S", "T", ["X", "Y"]);
    const yx = planExact(t, "S", "T", ["Y", "X"]);

    expect(xy).toMatchObject({ kind: "route", visitOrder: ["X", "Y"], totalDistance: 3 });
    expect(yx).toMatchObject({ kind: "route", visitOrder: ["Y", "X"], totalDistance: 3 });
  });

  it("logs how many orderings were evaluated", () => {
    const t = table(lineNetwork(), ["S", "T", "P", "Q"]);
    planExact(t, "S", "T", ["P", "Q"]);
    expect(console.log).toHaveBeenCalledWith("[exact] Evaluated 2 orderings of 2 waypoints, 0 infeasible");
  });

  it("is infeasible when no ordering reaches every waypoint", () => {
    const network = lineNetwork();
    network.addRoad("M", "N", 4);
    const t = table(network, ["S", "T", "P", "M"]);

    expect(planExact(t, "S", "T", ["P", "M"])).toEqual({
      kind: "infeasible",
      reason: "no-feasible-ordering",
      message: "Could not find a valid route visiting all specified attractions",
    });
  });
});
