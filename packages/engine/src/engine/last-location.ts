import type { CacheBucket } from "../buckets";

export interface NavigationHost {
  /**
   * Segments of the location the user visited last, or null when unknown.
   */
  lastLocation(): Promise<readonly string[] | null>;
  listIdForType(listType: string): Promise<string>;
}

export interface LocationTarget {
  bucket: CacheBucket;
  identifier: string;
}

export type LocationRoute =
  | { kind: "targets"; targets: LocationTarget[] }
  | { kind: "malformed"; segments: string[] };

export const splitLocationPath = (locationPath: string): string[] =>
  locationPath.split("/").filter((segment) => segment.length > 0);

/**
 * Maps a visited location onto the cache entries that rendered it.
 */
export async function routeLocation(
  rawSegments: readonly string[],
  knownListTypes: readonly string[],
  listIdForType: (listType: string) => Promise<string>
): Promise<LocationRoute> {
  const segments = rawSegments.filter((segment) => segment.length > 0);
  const [view, id] = segments;
  if (view !== "video_list" && view !== "show") {
    return { kind: "targets", targets: [] };
  }
  if (segments.length < 2) {
    return { kind: "malformed", segments };
  }

  if (view === "video_list") {
    if (knownListTypes.includes(id)) {
      const listId = await listIdForType(id);
      return {
        kind: "targets",
        targets: [
          { bucket: "video_list", identifier: listId },
          { bucket: "common", identifier: id }
        ]
      };
    }
    return { kind: "targets", targets: [{ bucket: "video_list", identifier: id }] };
  }

  if (view === "show") {
    if (segments.length > 3) {
      return { kind: "targets", targets: [{ bucket: "episodes", identifier: segments[3] }] };
    }
    return { kind: "targets", targets: [{ bucket: "seasons", identifier: id }] };
  }

  return { kind: "targets", targets: [] };
}
