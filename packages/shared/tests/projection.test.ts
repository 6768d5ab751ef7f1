import { describe, it, expect } from 'vitest';
import { createLocationTable, defaultLocationTable } from '../src/geo/locations';
import {
  project,
  projectCoordinates,
  resolveNode,
  unprojectPoint,
} from '../src/geo/projection';
import { DEFAULT_BBOX } from '../src/constants';

describe('resolveNode', () => {
  it('resolves a location key', () => {
    const result = resolveNode('sjc', defaultLocationTable);
    expect(result.value).toEqual({
      id: 'sjc',
      label: 'San Jose',
      coordinates: { lat: 37, lng: -122 },
      location: 'sjc',
    });
  });

  it('resolves aliases to the development coordinate', () => {
    expect(resolveNode('localhost', defaultLocationTable).value?.coordinates).toEqual({ lat: 47, lng: -122 });
  });

  it('gives explicit coordinates a derived id and label', () => {
    const result = resolveNode({ lat: 10, lng: 20 }, defaultLocationTable);
    expect(result.value).toEqual({
      id: 'pt:10:20',
      label: 'Node at 10, 20',
      coordinates: { lat: 10, lng: 20 },
    });
  });

  it('accepts a coordinates pair with a label', () => {
    const result = resolveNode({ coordinates: [51, 0], label: 'Office', id: 'hq' }, defaultLocationTable);
    expect(result.value).toEqual({ id: 'hq', label: 'Office', coordinates: { lat: 51, lng: 0 } });
  });

  it('rejects unknown keys outside legacy mode', () => {
    expect(resolveNode('nowhere', defaultLocationTable).error?.code).toBe('unknown_location');
  });

  it('places unknown keys off-frame in legacy mode', () => {
    const result = resolveNode('nowhere', defaultLocationTable, { legacy: true });
    expect(result.value?.coordinates).toEqual({ lat: 0, lng: -190 });
  });

  it('rejects out-of-range coordinates', () => {
    const lat = resolveNode({ lat: 200, lng: 0 }, defaultLocationTable);
    expect(lat.error?.code).toBe('out_of_range');
    expect(lat.error?.field).toBe('lat');
    expect(resolveNode({ lat: 0, lng: -181 }, defaultLocationTable).error?.field).toBe('lng');
  });

  it('rejects malformed nodes', () => {
    expect(resolveNode(42, defaultLocationTable).error?.code).toBe('malformed_node');
    expect(resolveNode('', defaultLocationTable).error?.code).toBe('malformed_node');
    expect(resolveNode({ label: 'x' }, defaultLocationTable).error?.code).toBe('malformed_node');
  });

  it('lets custom locations override built-ins', () => {
    const table = createLocationTable({ custom: { sjc: { name: 'Lab', lat: 1, lng: 2 } } });
    expect(resolveNode('sjc', table).value?.label).toBe('Lab');
    expect(table.keys()).not.toContain('localhost');
  });
});

describe('projectCoordinates', () => {
  it('maps the origin to the centre of the surface', () => {
    expect(projectCoordinates({ lat: 0, lng: 0 }, DEFAULT_BBOX)).toEqual({ x: 400, y: 195.5 });
  });

  it('maps the corners to the bounding box corners', () => {
    expect(projectCoordinates({ lat: 90, lng: -180 }, DEFAULT_BBOX)).toEqual({ x: 0, y: 0 });
    expect(projectCoordinates({ lat: -90, lng: 180 }, DEFAULT_BBOX)).toEqual({ x: 800, y: 391 });
  });

  it('honours the bounding box offset', () => {
    const bbox = { minX: 100, minY: 50, maxX: 460, maxY: 230 };
    expect(projectCoordinates({ lat: 0, lng: 0 }, bbox)).toEqual({ x: 280, y: 140 });
  });

  it('is deterministic and inverts with unprojectPoint', () => {
    const coordinates = { lat: 37, lng: -122 };
    const point = projectCoordinates(coordinates, DEFAULT_BBOX);
    expect(projectCoordinates(coordinates, DEFAULT_BBOX)).toEqual(point);
    const back = unprojectPoint(point, DEFAULT_BBOX);
    expect(back.lat).toBeCloseTo(37, 9);
    expect(back.lng).toBeCloseTo(-122, 9);
  });

  it('projects raw nodes through the location table', () => {
    expect(project('lhr', DEFAULT_BBOX, defaultLocationTable).value).toEqual(
      projectCoordinates({ lat: 51, lng: 0 }, DEFAULT_BBOX),
    );
    expect(project('nowhere', DEFAULT_BBOX, defaultLocationTable).ok).toBe(false);
  });
});
