/**
 * Shortest-path search module.
 *
 * The oracle every planner is built on: one Dijkstra run per key point
 * yields distances and predecessor chains for the whole network.
 */

export { dijkstra, reconstructPath } from "./dijkstra.js";
export { PriorityQueue } from "./priority-queue.js";
