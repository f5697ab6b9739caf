/**
 * Join shortest-path segments into one continuous route.
 *
 * Segment i+1 must start where segment i ends; the shared city is kept once.
 * A mismatch can only come from a broken shortest-path table, so it throws
 * instead of returning a route that skips part of the trip.
 */

import type { CityId } from "@roadtrip/types";
import { InvalidSegmentJoinError } from "./errors.js";

export function assemblePath(segments: readonly (readonly CityId[])[]): CityId[] {
  const path: CityId[] = [];

  segments.forEach((segment, index) => {
    const head = segment[0];
    if (head === undefined) {
      throw new InvalidSegmentJoinError(`Segment ${index} is empty`);
    }
    if (index === 0) {
      path.push(...segment);
      return;
    }
    const tail = path[path.length - 1];
    if (tail !== head) {
      throw new InvalidSegmentJoinError(
        `Segment ${index} starts at '${head}' but the previous segment ends at '${String(tail)}'`,
      );
    }
    path.push(...segment.slice(1));
  });

  return path;
}
