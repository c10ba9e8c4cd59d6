import * as d3 from 'd3';
import { RED_RATE_MAX, RED_RATE_MIN, RED_RATE_STEP } from './config';
import { formatCount, formatRate } from './stats';
import type { Hotspot } from './types';

interface ThresholdControlOptions {
  initial: number;
  onCommit: (value: number) => void;
  min?: number;
  max?: number;
  step?: number;
}

interface HashState {
  rate?: number;
}

export function clampThreshold(value: number, min = RED_RATE_MIN, max = RED_RATE_MAX, step = RED_RATE_STEP): number {
  if (!Number.isFinite(value)) return min;
  const stepped = min + Math.round((value - min) / step) * step;
  return Number(Math.min(max, Math.max(min, stepped)).toFixed(2));
}

function parseHash(hash: string = window.location.hash): HashState {
  const state: HashState = {};
  const trimmed = hash.replace('#', '');
  if (!trimmed) return state;
  for (const segment of trimmed.split('&')) {
    const [key, rawValue] = segment.split('=');
    if (key !== 'rate' || !rawValue) continue;
    const value = Number(rawValue);
    if (Number.isFinite(value)) {
      state.rate = clampThreshold(value);
    }
  }
  return state;
}

function updateHash(rate: number) {
  const hash = `rate=${rate.toFixed(2)}`;
  if (window.location.hash !== `#${hash}`) {
    window.location.hash = hash;
  }
}

/**
 * Range input for the red rate. Dragging only moves the readout; the value
 * is committed when the handle is released (the input's `change` event).
 */
export class ThresholdControl {
  private input: HTMLInputElement;

  private readout: HTMLSpanElement;

  private options: Required<ThresholdControlOptions>;

  private committed: number;

  constructor(container: HTMLElement, options: ThresholdControlOptions) {
    this.options = {
      min: RED_RATE_MIN,
      max: RED_RATE_MAX,
      step: RED_RATE_STEP,
      ...options
    };
    const { min, max, step } = this.options;
    this.committed = clampThreshold(options.initial, min, max, step);

    const group = document.createElement('div');
    group.className = 'panel-surface threshold-control';
    group.innerHTML = `
      <label class="control-label" for="red-rate">Red rate</label>
      <div class="control-row">
        <input id="red-rate" type="range" />
        <span class="control-value" data-role="readout"></span>
      </div>
      <p class="input-description">Counties growing at this daily rate or faster are drawn fully red; a rate of 1 means no new cases.</p>
    `;
    container.appendChild(group);

    const input = group.querySelector<HTMLInputElement>('input[type="range"]');
    const readout = group.querySelector<HTMLSpanElement>('[data-role="readout"]');
    if (!input || !readout) {
      throw new Error('Threshold control markup is incomplete');
    }
    this.input = input;
    this.readout = readout;
    this.input.min = String(min);
    this.input.max = String(max);
    this.input.step = String(step);
    this.input.value = String(this.committed);
    this.readout.textContent = formatRate(this.committed);

    this.input.addEventListener('input', () => {
      this.readout.textContent = formatRate(this.currentInputValue());
    });
    this.input.addEventListener('change', () => this.commit(this.currentInputValue()));
  }

  get value(): number {
    return this.committed;
  }

  /** Moves the control without notifying listeners. */
  setValue(value: number) {
    const { min, max, step } = this.options;
    this.committed = clampThreshold(value, min, max, step);
    this.input.value = String(this.committed);
    this.readout.textContent = formatRate(this.committed);
  }

  private currentInputValue(): number {
    const { min, max, step } = this.options;
    return clampThreshold(Number(this.input.value), min, max, step);
  }

  private commit(value: number) {
    this.readout.textContent = formatRate(value);
    if (value === this.committed) return;
    this.committed = value;
    this.options.onCommit(value);
  }
}

export class HotspotList {
  private list: HTMLElement;

  private onSelect: (fips: string) => void;

  constructor(container: HTMLElement, onSelect: (fips: string) => void) {
    this.onSelect = onSelect;
    const section = document.createElement('div');
    section.className = 'panel-surface hotspots';
    section.innerHTML = `
      <span class="section-heading">Fastest growing</span>
      <div class="hotspot-list" data-role="hotspot-list"></div>
    `;
    container.appendChild(section);
    const list = section.querySelector<HTMLElement>('[data-role="hotspot-list"]');
    if (!list) {
      throw new Error('Hotspot list markup is incomplete');
    }
    this.list = list;
  }

  update(hotspots: Hotspot[]) {
    const items = d3
      .select(this.list)
      .selectAll<HTMLButtonElement, Hotspot>('button')
      .data(hotspots, (d) => d.fips)
      .join((enter) =>
        enter
          .append('button')
          .attr('type', 'button')
          .attr('class', 'hotspot')
          .on('click', (_event: MouseEvent, d) => this.onSelect(d.fips))
      )
      .attr('data-fips', (d) => d.fips)
      .text((d) => `${d.county}, ${d.state}: ${formatRate(d.rate)} (${formatCount(d.cases)} cases)`);
    items.order();
    if (hotspots.length === 0) {
      this.list.dataset.empty = 'true';
    } else {
      delete this.list.dataset.empty;
    }
  }
}

export { parseHash, updateHash };
