import { describe, it, expect, vi } from "vitest";
import type { CityId } from "@roadtrip/types";
import { RoadNetwork } from "../domain/road-network.js";
import { dijkstra, reconstructPath } from "./dijkstra.js";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

/**
 *   A --4-- B ==3/5== D --6-- F
 *    \     /          |      /
 *     2   1           2     2
 *      \ /            |    /
 *       C -----10---- E --
 *       C -----8----- D
 *
 *   X --1-- Y (separate component)
 */
function fixtureNetwork(): RoadNetwork {
  return RoadNetwork.fromRoads([
    { cityA: "A", cityB: "B", distance: 4 },
    { cityA: "A", cityB: "C", distance: 2 },
    { cityA: "B", cityB: "C", distance: 1 },
    { cityA: "B", cityB: "D", distance: 5 },
    { cityA: "B", cityB: "D", distance: 3 },
    { cityA: "C", cityB: "D", distance: 8 },
    { cityA: "C", cityB: "E", distance: 10 },
    { cityA: "D", cityB: "E", distance: 2 },
    { cityA: "D", cityB: "F", distance: 6 },
    { cityA: "E", cityB: "F", distance: 2 },
    { cityA: "X", cityB: "Y", distance: 1 },
  ]);
}

/** Minimum cost to every city over all simple paths (exhaustive DFS) */
function bruteForceDistances(network: RoadNetwork, source: CityId): Map<CityId, number> {
  const best = new Map<CityId, number>();
  for (const city of network.cities()) best.set(city, Infinity);

  const onPath = new Set<CityId>();
  function walk(city: CityId, cost: number): void {
    if (cost < (best.get(city) ?? Infinity)) best.set(city, cost);
    onPath.add(city);
    for (const n of network.neighbors(city)) {
      if (!onPath.has(n.city)) walk(n.city, cost + n.distance);
    }
    onPath.delete(city);
  }
  walk(source, 0);
  return best;
}

/** Small deterministic pseudo-random graph */
function randomNetwork(seed: number, cityCount: number, roadCount: number): RoadNetwork {
  let state = seed;
  const next = (): number => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
  const network = new RoadNetwork();
  for (let i = 0; i < roadCount; i++) {
    const a = `c${Math.floor(next() * cityCount)}`;
    const b = `c${Math.floor(next() * cityCount)}`;
    network.addRoad(a, b, Math.round(next() * 100) / 4);
  }
  return network;
}

// ---------------------------------------------------------------------------
// dijkstra
// ---------------------------------------------------------------------------

describe("dijkstra", () => {
  it("computes shortest distances, using the shorter of parallel roads", () => {
    const tree = dijkstra(fixtureNetwork(), "A");

    expect(tree.source).toBe("A");
    expect(tree.distances.get("A")).toBe(0);
    expect(tree.distances.get("C")).toBe(2);
    expect(tree.distances.get("B")).toBe(3);
    expect(tree.distances.get("D")).toBe(6);
    expect(tree.distances.get("E")).toBe(8);
    expect(tree.distances.get("F")).toBe(10);
  });

  it("reports every city, with Infinity for unreachable ones", () => {
    const tree = dijkstra(fixtureNetwork(), "A");

    expect(tree.distances.size).toBe(8);
    expect(tree.distances.get("X")).toBe(Infinity);
    expect(tree.distances.get("Y")).toBe(Infinity);
  });

  it("sets predecessors only for reachable non-source cities", () => {
    const tree = dijkstra(fixtureNetwork(), "A");

    expect(tree.predecessors.has("A")).toBe(false);
    expect(tree.predecessors.has("X")).toBe(false);
    expect(tree.predecessors.get("B")).toBe("C");
    expect(tree.predecessors.get("D")).toBe("B");
    expect(tree.predecessors.get("F")).toBe("E");
    expect(tree.predecessors.size).toBe(5);
  });

  it("returns empty maps for a source outside the network", () => {
    const tree = dijkstra(fixtureNetwork(), "Nowhere");
    expect(tree.distances.size).toBe(0);
    expect(tree.predecessors.size).toBe(0);
  });

  it("is symmetric on an undirected network", () => {
    const network = fixtureNetwork();
    const cities = [...network.cities()];
    const trees = new Map(cities.map((c) => [c, dijkstra(network, c)]));

    for (const u of cities) {
      for (const v of cities) {
        const uv = trees.get(u)?.distances.get(v);
        const vu = trees.get(v)?.distances.get(u);
        expect(uv).toBe(vu);
      }
    }
  });

  it("matches exhaustive path enumeration on the fixture", () => {
    const network = fixtureNetwork();
    for (const source of network.cities()) {
      expect(dijkstra(network, source).distances).toEqual(bruteForceDistances(network, source));
    }
  });

  it("matches exhaustive path enumeration on random multigraphs", () => {
    for (const seed of [1, 7, 42, 1234]) {
      const network = randomNetwork(seed, 7, 14);
      for (const source of network.cities()) {
        const computed = dijkstra(network, source).distances;
        const expected = bruteForceDistances(network, source);
        for (const [city, distance] of expected) {
          expect(computed.get(city)).toBe(distance);
        }
      }
    }
  });

  it("gives zero-length roads zero cost", () => {
    const network = RoadNetwork.fromRoads([
      { cityA: "A", cityB: "B", distance: 0 },
      { cityA: "B", cityB: "C", distance: 2 },
    ]);
    const tree = dijkstra(network, "A");
    expect(tree.distances.get("B")).toBe(0);
    expect(tree.distances.get("C")).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// reconstructPath
// ---------------------------------------------------------------------------

describe("reconstructPath", () => {
  it("follows predecessors back to the source", () => {
    const tree = dijkstra(fixtureNetwork(), "A");
    expect(reconstructPath(tree, "F")).toEqual(["A", "C", "B", "D", "E", "F"]);
  });

  it("returns the source alone for a zero-length path", () => {
    const tree = dijkstra(fixtureNetwork(), "A");
    expect(reconstructPath(tree, "A")).toEqual(["A"]);
  });

  it("returns undefined for unreachable targets", () => {
    const tree = dijkstra(fixtureNetwork(), "A");
    expect(reconstructPath(tree, "Y")).toBeUndefined();
  });

  it("returns undefined when the source is not in the network", () => {
    const tree = dijkstra(fixtureNetwork(), "Nowhere");
    expect(reconstructPath(tree, "Nowhere")).toBeUndefined();
    expect(reconstructPath(tree, "A")).toBeUndefined();
  });

  it("rejects a predecessor chain that never reaches the source", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const tree = {
      source: "A",
      distances: new Map([["A", 0], ["B", 1], ["C", 2]]),
      predecessors: new Map([["C", "B"], ["B", "C"]]),
    };

    expect(reconstructPath(tree, "C")).toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith("[dijkstra] Predecessor chain from C does not reach A");
    errorSpy.mockRestore();
  });
});
