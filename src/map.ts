import * as d3 from 'd3';
import type { GeographyData } from './geography';
import { MAP_CENTER, MAP_ZOOM, rateColor } from './render';
import { formatRate } from './stats';
import { createLegend, type LegendHandle } from './viz/legend';
import type { CircleSpec, LatLon, MapModel } from './types';

interface MapCallbacks {
  onHover?: (circle: CircleSpec | null) => void;
  onSelect?: (circle: CircleSpec) => void;
}

const EARTH_RADIUS_METRES = 6_371_008.8;

const TILE_SIZE = 256;

const DEFAULT_COLORS = {
  nation: '#334155',
  states: '#94a3b8',
  flash: '#f97316'
};

const CIRCLE_FILL_OPACITY = 0.2;

const CIRCLE_STROKE_WIDTH = 1.5;

/** Angular radius of a circle with the given ground radius. */
export function metresToDegrees(metres: number): number {
  return (metres / EARTH_RADIUS_METRES) * (180 / Math.PI);
}

/** Web-Mercator scale for a slippy-map zoom level. */
export function zoomToScale(zoom: number): number {
  return (TILE_SIZE * 2 ** zoom) / (2 * Math.PI);
}

export class CaseMap {
  private container: HTMLElement;

  private svg: d3.Selection<SVGSVGElement, unknown, null, undefined>;

  private viewport: d3.Selection<SVGGElement, unknown, null, undefined>;

  private baseLayer: d3.Selection<SVGGElement, unknown, null, undefined>;

  private circleLayer: d3.Selection<SVGGElement, unknown, null, undefined>;

  private tooltip: d3.Selection<HTMLDivElement, unknown, null, undefined>;

  private legendElement: HTMLDivElement;

  private legend: LegendHandle | null = null;

  private projection = d3.geoMercator();

  private path = d3.geoPath(this.projection);

  private zoomBehavior = d3.zoom<SVGSVGElement, unknown>().scaleExtent([0.5, 64]);

  private circlePaths: d3.Selection<SVGPathElement, CircleSpec, SVGGElement, unknown> | null = null;

  private callbacks: MapCallbacks;

  private model: MapModel | null = null;

  private width = 960;

  private height = 640;

  constructor(container: HTMLElement, geography: GeographyData, callbacks: MapCallbacks = {}) {
    this.container = container;
    this.callbacks = callbacks;
    this.svg = d3
      .select(container)
      .append('svg')
      .attr('role', 'img')
      .attr('aria-label', 'Map of U.S. county case counts')
      .attr('class', 'case-map');

    this.viewport = this.svg.append('g').attr('class', 'viewport');
    this.baseLayer = this.viewport.append('g').attr('class', 'base');
    this.circleLayer = this.viewport.append('g').attr('class', 'circles');

    this.baseLayer
      .append('path')
      .datum(geography.nationMesh)
      .attr('class', 'nation')
      .attr('fill', 'none')
      .attr('stroke', DEFAULT_COLORS.nation)
      .attr('stroke-width', 1)
      .attr('vector-effect', 'non-scaling-stroke');
    this.baseLayer
      .append('path')
      .datum(geography.statesMesh)
      .attr('class', 'states')
      .attr('fill', 'none')
      .attr('stroke', DEFAULT_COLORS.states)
      .attr('stroke-width', 0.7)
      .attr('vector-effect', 'non-scaling-stroke');

    this.tooltip = d3.select(container).append('div').attr('class', 'map-tooltip hidden');

    this.legendElement = document.createElement('div');
    this.legendElement.className = 'map-legend';
    container.appendChild(this.legendElement);

    const resetButton = document.createElement('button');
    resetButton.type = 'button';
    resetButton.className = 'map-reset';
    resetButton.textContent = 'Reset view';
    resetButton.addEventListener('click', () => this.zoomReset());
    container.appendChild(resetButton);

    this.setupZoom();
    window.addEventListener('resize', () => this.resize());
    this.resize();
  }

  private setupZoom() {
    this.zoomBehavior.on('zoom', (event: d3.D3ZoomEvent<SVGSVGElement, unknown>) => {
      this.viewport.attr('transform', event.transform.toString());
    });
    this.svg.call(this.zoomBehavior);
  }

  private applyView() {
    const center: LatLon = this.model?.center ?? MAP_CENTER;
    const zoom = this.model?.zoom ?? MAP_ZOOM;
    this.projection
      .center([center.lon, center.lat])
      .scale(zoomToScale(zoom))
      .translate([this.width / 2, this.height / 2]);
    this.path = d3.geoPath(this.projection);
    this.baseLayer.selectAll<SVGPathElement, GeoJSON.MultiLineString>('path').attr('d', this.path);
    this.circlePaths?.attr('d', (d) => this.circlePath(d));
  }

  private circlePath(circle: CircleSpec): string | null {
    const shape = d3
      .geoCircle()
      .center([circle.center.lon, circle.center.lat])
      .radius(metresToDegrees(circle.radius))();
    return this.path(shape);
  }

  private resize() {
    const bounds = this.container.getBoundingClientRect();
    this.width = bounds.width || 960;
    this.height = bounds.height || 640;
    this.svg.attr('viewBox', `0 0 ${this.width} ${this.height}`);
    this.applyView();
  }

  private handleHover(event: MouseEvent, circle: CircleSpec) {
    this.callbacks.onHover?.(circle);
    this.tooltip.classed('hidden', false).text(circle.tooltip);
    const [x, y] = d3.pointer(event, this.container);
    this.tooltip.style('transform', `translate(${x + 16}px, ${y + 16}px)`);
  }

  private hideTooltip() {
    this.tooltip.classed('hidden', true);
    this.callbacks.onHover?.(null);
  }

  /**
   * Draws the model. Circles are re-ordered in the DOM to follow the model
   * so later (smaller) circles paint over earlier ones.
   */
  update(model: MapModel) {
    this.model = model;
    this.applyView();
    this.circlePaths = this.circleLayer
      .selectAll<SVGPathElement, CircleSpec>('path')
      .data(model.circles, (d) => d.fips)
      .join((enter) =>
        enter
          .append('path')
          .attr('class', 'county-circle')
          .attr('vector-effect', 'non-scaling-stroke')
          .attr('fill-opacity', CIRCLE_FILL_OPACITY)
          .attr('stroke-width', CIRCLE_STROKE_WIDTH)
          .on('mousemove', (event: MouseEvent, d) => this.handleHover(event, d))
          .on('mouseleave', () => this.hideTooltip())
          .on('click', (_event: MouseEvent, d) => this.callbacks.onSelect?.(d))
      )
      .attr('data-fips', (d) => d.fips)
      .attr('d', (d) => this.circlePath(d))
      .attr('fill', (d) => d.color)
      .attr('stroke', (d) => d.color)
      .order();
    this.renderLegend(model.threshold);
  }

  private renderLegend(threshold: number) {
    const color = rateColor(threshold);
    const domain: [number, number] = [1, Math.max(1, threshold)];
    const title = `Growth rate (red at ${threshold.toFixed(2)})`;
    if (this.legend) {
      this.legend.update(color, domain, title);
    } else {
      this.legend = createLegend({ element: this.legendElement, color, domain, title, format: formatRate });
    }
  }

  zoomReset() {
    this.svg.transition().duration(500).call(this.zoomBehavior.transform, d3.zoomIdentity);
  }

  focusOnCounty(fips: string) {
    const circle = this.model?.circles.find((d) => d.fips === fips);
    if (!circle) return;
    const point = this.projection([circle.center.lon, circle.center.lat]);
    if (!point) return;
    const scale = 8;
    const [x, y] = point;
    this.svg
      .transition()
      .duration(750)
      .call(
        this.zoomBehavior.transform,
        d3.zoomIdentity.translate(this.width / 2 - scale * x, this.height / 2 - scale * y).scale(scale)
      );
  }

  flashCounty(fips: string) {
    if (!this.circlePaths) return;
    this.circlePaths
      .filter((d) => d.fips === fips)
      .transition()
      .duration(150)
      .attr('stroke-width', 4)
      .attr('stroke', DEFAULT_COLORS.flash)
      .transition()
      .duration(800)
      .attr('stroke-width', CIRCLE_STROKE_WIDTH)
      .attr('stroke', (d) => d.color);
  }
}
