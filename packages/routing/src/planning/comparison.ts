/**
 * Side-by-side run of the exact and heuristic planners.
 *
 * Each strategy is timed separately. A strategy that throws (unknown city,
 * waypoint limit) is reported as failed without stopping the other one.
 */

import type { PlanOutcome, PlanRequest, PlanStrategy } from "@roadtrip/types";
import type { RoutePlanner } from "./route-planner.js";

export type StrategyRun =
  | { status: "completed"; outcome: PlanOutcome; elapsedMs: number }
  | { status: "failed"; error: { name: string; message: string }; elapsedMs: number };

export interface PlannerComparison {
  request: PlanRequest;
  optimal: StrategyRun;
  heuristic: StrategyRun;
}

const STRATEGY_LABELS: Record<PlanStrategy, string> = {
  optimal: "Optimal (Dijkstra + Permutations)",
  heuristic: "Heuristic (Nearest Neighbor)",
};

export function comparePlanners(planner: RoutePlanner, request: PlanRequest): PlannerComparison {
  return {
    request,
    optimal: timeStrategy(planner, "optimal", request),
    heuristic: timeStrategy(planner, "heuristic", request),
  };
}

function timeStrategy(planner: RoutePlanner, strategy: PlanStrategy, request: PlanRequest): StrategyRun {
  const start = performance.now();
  try {
    const outcome = planner.plan(strategy, request.start, request.end, request.attractions);
    return { status: "completed", outcome, elapsedMs: performance.now() - start };
  } catch (err) {
    const elapsedMs = performance.now() - start;
    if (!(err instanceof Error)) throw err;
    console.error(`[compare] ${strategy} failed: ${err.message}`);
    return { status: "failed", error: { name: err.name, message: err.message }, elapsedMs };
  }
}

/** Render a comparison as the plain-text report printed by the CLI */
export function formatComparison(comparison: PlannerComparison, unit = "miles"): string {
  const { request } = comparison;
  const lines = [
    `From: ${request.start}`,
    `To:   ${request.end}`,
    `Via:  ${request.attractions.length > 0 ? request.attractions.join(", ") : "None"}`,
  ];

  for (const strategy of ["optimal", "heuristic"] as const) {
    const run = comparison[strategy];
    lines.push("", `${STRATEGY_LABELS[strategy]}:`);
    if (run.status === "completed" && run.outcome.kind === "route") {
      const { route } = run.outcome;
      lines.push(`  Route: ${route.path.join(" -> ")}`);
      lines.push(`  Distance: ${route.totalDistance.toFixed(1)} ${unit}`);
    } else {
      const detail = run.status === "failed" ? run.error.message : run.outcome.message;
      lines.push("  Route: Not found or path is impossible.");
      lines.push(`  Reason: ${detail}`);
      lines.push("  Distance: N/A");
    }
    lines.push(`  Execution Time: ${run.elapsedMs.toFixed(3)} ms`);
  }

  return lines.join("\n");
}
