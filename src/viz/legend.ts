import * as d3 from 'd3';

export interface LegendParams {
  element: HTMLElement;
  color: (value: number) => string;
  domain: [number, number];
  title: string;
  format?: (value: number) => string;
}

export interface LegendHandle {
  update: (color: (value: number) => string, domain: [number, number], title: string) => void;
}

export function createLegend(params: LegendParams): LegendHandle {
  const { element } = params;
  const width = element.clientWidth || 280;
  const height = 60;

  const svg = d3
    .select(element)
    .append('svg')
    .attr('class', 'legend')
    .attr('viewBox', `0 0 ${width} ${height}`)
    .attr('preserveAspectRatio', 'xMidYMid meet');

  const titleEl = svg.append('text').attr('class', 'legend-title').attr('x', 0).attr('y', 12);
  const gradientId = `legend-gradient-${Math.random().toString(36).slice(2)}`;
  const gradient = svg.append('defs').append('linearGradient').attr('id', gradientId);
  gradient.attr('x1', '0%').attr('x2', '100%').attr('y1', '0%').attr('y2', '0%');

  svg
    .append('rect')
    .attr('class', 'legend-bar')
    .attr('x', 0)
    .attr('y', 20)
    .attr('height', 12)
    .attr('width', width - 20)
    .attr('fill', `url(#${gradientId})`);

  const axisGroup = svg.append('g').attr('class', 'legend-axis').attr('transform', 'translate(0, 40)');

  function apply(color: (value: number) => string, domain: [number, number], title: string) {
    const [min, max] = domain;
    titleEl.text(title);

    const stops = d3.range(0, 1.0001, 0.1).map((t) => ({ offset: t, color: color(min + (max - min) * t) }));
    gradient
      .selectAll('stop')
      .data(stops)
      .join('stop')
      .attr('offset', (d) => `${d.offset * 100}%`)
      .attr('stop-color', (d) => d.color);

    const axisScale = d3.scaleLinear().domain([min, max]).range([0, width - 20]);
    const formatter = params.format ?? d3.format('.2f');
    axisGroup.call(
      d3
        .axisBottom(axisScale)
        .ticks(4)
        .tickFormat((value) => formatter(Number(value)))
    );
  }

  apply(params.color, params.domain, params.title);

  return {
    update(color, domain, title) {
      apply(color, domain, title);
    }
  };
}
