// ─── Coordinate Projector ────────────────────────────────
// Equirectangular mapping from WGS84 into a drawing surface bounding box.
// No distortion correction: x is linear in longitude, y linear in latitude
// (inverted, since surface y grows downwards).

import { OFF_FRAME_COORDINATES } from '../constants';
import { ValidationError, fail, ok, type Result } from '../errors';
import { MapNodeInputSchema } from '../schemas/inputs';
import { zLatitude, zLongitude } from '../schemas/validators';
import type { BoundingBox, LatLng, PlacedNode, Point } from '../types/map';
import type { LocationTable } from './locations';

export interface ResolveOptions {
  /**
   * Compatibility mode: unknown location keys are placed at an off-frame
   * coordinate instead of being rejected.
   */
  legacy?: boolean;
}

export function coordinateNodeId(coordinates: LatLng): string {
  return `pt:${coordinates.lat}:${coordinates.lng}`;
}

function checkRange(coordinates: LatLng): ValidationError | null {
  if (!zLatitude.safeParse(coordinates.lat).success) {
    return new ValidationError('out_of_range', `Latitude ${coordinates.lat} is outside [-90, 90]`, 'lat');
  }
  if (!zLongitude.safeParse(coordinates.lng).success) {
    return new ValidationError('out_of_range', `Longitude ${coordinates.lng} is outside [-180, 180]`, 'lng');
  }
  return null;
}

/**
 * Resolve any accepted node shape to a placed node: a location key, an
 * explicit `{ lat, lng }`, or `{ coordinates, label }`.
 */
export function resolveNode(
  input: unknown,
  table: LocationTable,
  options: ResolveOptions = {},
): Result<PlacedNode> {
  const parsed = MapNodeInputSchema.safeParse(input);
  if (!parsed.success) {
    return fail(
      new ValidationError(
        'malformed_node',
        'Expected a location key, { lat, lng } or { coordinates, label }',
      ),
    );
  }
  const node = parsed.data;

  if (typeof node === 'string') {
    const entry = table.lookup(node);
    if (entry) {
      return ok({ id: node, label: entry.name, coordinates: entry.coordinates, location: node });
    }
    if (options.legacy) {
      return ok({ id: node, label: node, coordinates: { ...OFF_FRAME_COORDINATES }, location: node });
    }
    return fail(new ValidationError('unknown_location', `Unknown location "${node}"`));
  }

  const coordinates = 'coordinates' in node ? node.coordinates : { lat: node.lat, lng: node.lng };
  const rangeError = checkRange(coordinates);
  if (rangeError) return fail(rangeError);

  return ok({
    id: node.id ?? coordinateNodeId(coordinates),
    label: node.label ?? `Node at ${coordinates.lat}, ${coordinates.lng}`,
    coordinates: { lat: coordinates.lat, lng: coordinates.lng },
  });
}

export function projectCoordinates(coordinates: LatLng, bbox: BoundingBox): Point {
  const width = bbox.maxX - bbox.minX;
  const height = bbox.maxY - bbox.minY;
  const xRatio = (coordinates.lng + 180) / 360;
  const yRatio = 1 - (coordinates.lat + 90) / 180;
  return {
    x: xRatio * width + bbox.minX,
    y: yRatio * height + bbox.minY,
  };
}

/** Inverse of projectCoordinates. */
export function unprojectPoint(point: Point, bbox: BoundingBox): LatLng {
  const width = bbox.maxX - bbox.minX;
  const height = bbox.maxY - bbox.minY;
  return {
    lat: (1 - (point.y - bbox.minY) / height) * 180 - 90,
    lng: ((point.x - bbox.minX) / width) * 360 - 180,
  };
}

export function project(
  node: unknown,
  bbox: BoundingBox,
  table: LocationTable,
  options: ResolveOptions = {},
): Result<Point> {
  const resolved = resolveNode(node, table, options);
  if (!resolved.ok) return resolved;
  return ok(projectCoordinates(resolved.value.coordinates, bbox));
}
