import * as d3 from 'd3';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { mesh } from 'topojson-client';
import type { GeometryCollection, Topology } from 'topojson-specification';
import statesTopologyUrl from 'us-atlas/states-10m.json?url';
import { createGeographyError, type GeographyError } from './errors';

type StatesTopology = Topology<{ states: GeometryCollection; nation: GeometryCollection }>;

export interface GeographyData {
  statesMesh: GeoJSON.MultiLineString;
  nationMesh: GeoJSON.MultiLineString;
}

export function loadGeography(url: string = statesTopologyUrl): ResultAsync<GeographyData, GeographyError> {
  return ResultAsync.fromPromise(d3.json<StatesTopology>(url), (cause) => createGeographyError(url, cause)).andThen(
    (topology): Result<GeographyData, GeographyError> => {
      if (!topology) {
        return err(createGeographyError(url, 'empty response'));
      }
      const statesMesh = mesh(topology, topology.objects.states, (a, b) => a !== b);
      const nationMesh = mesh(topology, topology.objects.nation);
      return ok({ statesMesh, nationMesh });
    }
  );
}
