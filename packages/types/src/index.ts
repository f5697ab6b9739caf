/**
 * @roadtrip/types
 *
 * Shared domain types for the road trip planning engine.
 *
 * - Network: cities, roads and shortest-path trees
 * - Route: planned routes and plan outcomes
 */

export * from "./network.js";
export * from "./route.js";
