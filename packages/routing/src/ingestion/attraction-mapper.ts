import type { AttractionMapper, CityId } from "@roadtrip/types";

/** In-memory attraction lookup, exact name match */
export class MapAttractionMapper implements AttractionMapper {
  private readonly byName: Map<string, CityId>;

  constructor(entries: Iterable<readonly [string, CityId]> = []) {
    this.byName = new Map(entries);
  }

  resolve(attractionName: string): CityId | undefined {
    return this.byName.get(attractionName);
  }

  get size(): number {
    return this.byName.size;
  }
}
