import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadGeography } from './geography';

const TOPOLOGY_URL = 'https://example.test/states.json';

const topology = {
  type: 'Topology',
  arcs: [
    [
      [0, 0],
      [1, 0]
    ],
    [
      [1, 0],
      [1, 1]
    ]
  ],
  objects: {
    states: { type: 'GeometryCollection', geometries: [{ type: 'LineString', arcs: [0] }] },
    nation: { type: 'GeometryCollection', geometries: [{ type: 'LineString', arcs: [0, 1] }] }
  }
};

describe('loadGeography', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the state and nation meshes', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify(topology))));

    const geography = (await loadGeography(TOPOLOGY_URL))._unsafeUnwrap();

    expect(geography.statesMesh).toEqual({ type: 'MultiLineString', coordinates: [] });
    expect(geography.nationMesh.type).toBe('MultiLineString');
    expect(geography.nationMesh.coordinates.length).toBeGreaterThan(0);
  });

  it('reports an HTTP failure as a geography error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' })));

    const error = (await loadGeography(TOPOLOGY_URL))._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'GeographyError', url: TOPOLOGY_URL });
    expect(error.message).toBe('Failed to load state outlines from https://example.test/states.json: 404 Not Found');
  });

  it('reports an empty response as a geography error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(null, { status: 204 })));

    const error = (await loadGeography(TOPOLOGY_URL))._unsafeUnwrapErr();

    expect(error.message).toBe('Failed to load state outlines from https://example.test/states.json: empty response');
  });
});
