// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { HotspotList, ThresholdControl, clampThreshold, parseHash, updateHash } from './ui';

describe('clampThreshold', () => {
  it('keeps the value inside the slider range', () => {
    expect(clampThreshold(2)).toBe(1.5);
    expect(clampThreshold(0.5)).toBe(1);
    expect(clampThreshold(Number.NaN)).toBe(1);
  });

  it('rounds to the slider step', () => {
    expect(clampThreshold(1.234)).toBe(1.23);
    expect(clampThreshold(1.05)).toBe(1.05);
  });
});

describe('hash state', () => {
  beforeEach(() => {
    window.location.hash = '';
  });

  it('reads the red rate from the hash', () => {
    expect(parseHash('#rate=1.10')).toEqual({ rate: 1.1 });
    expect(parseHash('#rate=9')).toEqual({ rate: 1.5 });
    expect(parseHash('#other=1')).toEqual({});
    expect(parseHash('')).toEqual({});
  });

  it('writes the red rate to the hash', () => {
    updateHash(1.1);
    expect(window.location.hash).toBe('#rate=1.10');
    expect(parseHash()).toEqual({ rate: 1.1 });
  });
});

describe('ThresholdControl', () => {
  let container: HTMLElement;

  beforeEach(() => {
    document.body.innerHTML = '';
    container = document.createElement('div');
    document.body.appendChild(container);
  });

  const slider = () => {
    const input = container.querySelector<HTMLInputElement>('input[type="range"]');
    if (!input) throw new Error('slider not rendered');
    return input;
  };

  const readout = () => container.querySelector('[data-role="readout"]')?.textContent;

  it('renders a 1.0 to 1.5 slider at the initial value', () => {
    const control = new ThresholdControl(container, { initial: 1.05, onCommit: vi.fn() });

    expect(slider().min).toBe('1');
    expect(slider().max).toBe('1.5');
    expect(slider().step).toBe('0.01');
    expect(slider().value).toBe('1.05');
    expect(readout()).toBe('1.050');
    expect(control.value).toBe(1.05);
  });

  it('does not commit while the handle is dragged', () => {
    const onCommit = vi.fn();
    new ThresholdControl(container, { initial: 1.05, onCommit });

    slider().value = '1.2';
    slider().dispatchEvent(new Event('input'));

    expect(onCommit).not.toHaveBeenCalled();
    expect(readout()).toBe('1.200');
  });

  it('commits once the handle is released', () => {
    const onCommit = vi.fn();
    const control = new ThresholdControl(container, { initial: 1.05, onCommit });

    slider().value = '1.2';
    slider().dispatchEvent(new Event('input'));
    slider().dispatchEvent(new Event('change'));

    expect(onCommit).toHaveBeenCalledTimes(1);
    expect(onCommit).toHaveBeenCalledWith(1.2);
    expect(control.value).toBe(1.2);
  });

  it('skips a release that lands on the committed value', () => {
    const onCommit = vi.fn();
    new ThresholdControl(container, { initial: 1.05, onCommit });

    slider().dispatchEvent(new Event('change'));

    expect(onCommit).not.toHaveBeenCalled();
  });

  it('moves without notifying when set from outside', () => {
    const onCommit = vi.fn();
    const control = new ThresholdControl(container, { initial: 1.05, onCommit });

    control.setValue(1.37);

    expect(control.value).toBe(1.37);
    expect(slider().value).toBe('1.37');
    expect(readout()).toBe('1.370');
    expect(onCommit).not.toHaveBeenCalled();
  });
});

describe('HotspotList', () => {
  it('lists counties and reports clicks', () => {
    const container = document.createElement('div');
    const onSelect = vi.fn();
    const list = new HotspotList(container, onSelect);

    list.update([
      { fips: '36047', county: 'Kings', state: 'NY', rate: 1.2, cases: 1234 },
      { fips: '36061', county: 'New York', state: 'NY', rate: 1.1, cases: 987 }
    ]);

    const buttons = [...container.querySelectorAll<HTMLButtonElement>('button.hotspot')];
    expect(buttons.map((b) => b.textContent)).toEqual([
      'Kings, NY: 1.200 (1,234 cases)',
      'New York, NY: 1.100 (987 cases)'
    ]);

    buttons[1].click();
    expect(onSelect).toHaveBeenCalledWith('36061');
  });

  it('flags an empty list', () => {
    const container = document.createElement('div');
    const list = new HotspotList(container, vi.fn());

    list.update([]);

    expect(container.querySelector<HTMLElement>('[data-role="hotspot-list"]')?.dataset.empty).toBe('true');
  });
});
