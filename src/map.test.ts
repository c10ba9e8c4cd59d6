// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { GeographyData } from './geography';
import { createLogger } from './logger';
import { CaseMap, metresToDegrees, zoomToScale } from './map';
import { HIGH_RATE_COLOR, LOW_RATE_COLOR, renderMap } from './render';
import type { CountyRecord } from './types';

const silent = createLogger({ level: 'silent' });

const geography: GeographyData = {
  statesMesh: {
    type: 'MultiLineString',
    coordinates: [
      [
        [-104, 41],
        [-104, 45]
      ]
    ]
  },
  nationMesh: {
    type: 'MultiLineString',
    coordinates: [
      [
        [-124, 48],
        [-67, 48]
      ]
    ]
  }
};

const county = (fips: string, cases: number[], lat = 40, lon = -95): CountyRecord => ({
  uid: `840${fips}`,
  fips,
  county: `County ${fips}`,
  state: 'KS',
  lat,
  lon,
  cases
});

describe('projection helpers', () => {
  it('converts metres on the ground to degrees of arc', () => {
    expect(metresToDegrees((6_371_008.8 * Math.PI) / 180)).toBeCloseTo(1, 12);
  });

  it('matches the slippy-map scale for a zoom level', () => {
    expect(zoomToScale(0)).toBeCloseTo(256 / (2 * Math.PI), 12);
    expect(zoomToScale(4)).toBeCloseTo(16 * zoomToScale(0), 9);
  });
});

describe('CaseMap', () => {
  let container: HTMLElement;

  beforeEach(() => {
    document.body.innerHTML = '';
    container = document.createElement('div');
    document.body.appendChild(container);
  });

  const circleFips = () =>
    [...container.querySelectorAll('path.county-circle')].map((path) => path.getAttribute('data-fips'));

  it('draws the base layers', () => {
    new CaseMap(container, geography);

    expect(container.querySelector('path.nation')?.getAttribute('d')).toBeTruthy();
    expect(container.querySelector('path.states')?.getAttribute('d')).toBeTruthy();
  });

  it('draws one circle per county in model order', () => {
    const map = new CaseMap(container, geography);
    const table = [
      county('20001', [100]),
      county('20003', [50]),
      county('20005', [1, 2, 4, 8, 16, 200])
    ];

    map.update(renderMap(table, 1.05, { logger: silent }));

    expect(circleFips()).toEqual(['20005', '20001', '20003']);
    const paths = [...container.querySelectorAll('path.county-circle')];
    expect(paths.map((path) => path.getAttribute('fill'))).toEqual([HIGH_RATE_COLOR, LOW_RATE_COLOR, LOW_RATE_COLOR]);
    for (const path of paths) {
      expect(path.getAttribute('d')).toMatch(/^M/);
    }
  });

  it('reorders and prunes circles on the next render', () => {
    const map = new CaseMap(container, geography);
    map.update(renderMap([county('20001', [100]), county('20003', [50]), county('20005', [10])], 1.05, { logger: silent }));

    map.update(renderMap([county('20001', [100]), county('20003', [500])], 1.05, { logger: silent }));

    expect(circleFips()).toEqual(['20003', '20001']);
  });

  it('shows the county tooltip on hover', () => {
    const onHover = vi.fn();
    const map = new CaseMap(container, geography, { onHover });
    const model = renderMap([county('20001', [1234])], 1.05, { logger: silent });
    map.update(model);

    container.querySelector('path.county-circle')?.dispatchEvent(new MouseEvent('mousemove', { clientX: 10, clientY: 20 }));

    const tooltip = container.querySelector('.map-tooltip');
    expect(tooltip?.textContent).toBe('County 20001, KS\nCases: 1,234\nRate: 0.000');
    expect(tooltip?.classList.contains('hidden')).toBe(false);
    expect(onHover).toHaveBeenCalledWith(model.circles[0]);

    container.querySelector('path.county-circle')?.dispatchEvent(new MouseEvent('mouseleave'));
    expect(tooltip?.classList.contains('hidden')).toBe(true);
    expect(onHover).toHaveBeenLastCalledWith(null);
  });

  it('reports clicked counties', () => {
    const onSelect = vi.fn();
    const map = new CaseMap(container, geography, { onSelect });
    const model = renderMap([county('20001', [10])], 1.05, { logger: silent });
    map.update(model);

    container.querySelector('path.county-circle')?.dispatchEvent(new MouseEvent('click'));

    expect(onSelect).toHaveBeenCalledWith(model.circles[0]);
  });

  it('titles the legend with the threshold', () => {
    const map = new CaseMap(container, geography);

    map.update(renderMap([], 1.2, { logger: silent }));

    expect(container.querySelector('.legend-title')?.textContent).toBe('Growth rate (red at 1.20)');
    expect(container.querySelectorAll('.map-legend stop')).toHaveLength(11);
  });

  it('labels the legend axis like rates', () => {
    const map = new CaseMap(container, geography);

    map.update(renderMap([], 1.2, { logger: silent }));

    const ticks = [...container.querySelectorAll('.legend-axis .tick text')].map((tick) => tick.textContent);
    expect(ticks).toEqual(['1.000', '1.050', '1.100', '1.150', '1.200']);
  });

  it('resets the zoom from the reset button', () => {
    const map = new CaseMap(container, geography);
    const zoomReset = vi.spyOn(map, 'zoomReset').mockImplementation(() => undefined);

    container.querySelector<HTMLButtonElement>('button.map-reset')?.click();

    expect(zoomReset).toHaveBeenCalledTimes(1);
  });
});
