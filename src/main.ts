import './styles.css';
import { parseConfig } from './config';
import { loadCaseTable } from './data';
import { describeLoadError } from './errors';
import { loadGeography } from './geography';
import { createLogger } from './logger';
import { CaseMap } from './map';
import { rankByRate, renderMap } from './render';
import { formatCount } from './stats';
import type { AppState, CaseTable } from './types';
import { HotspotList, ThresholdControl, parseHash, updateHash } from './ui';

const config = parseConfig(import.meta.env);
const logger = createLogger({ level: config.logLevel });

const app = document.querySelector<HTMLDivElement>('#app');
if (!app) {
  throw new Error('App container not found');
}

app.className = 'app';

const layout = document.createElement('div');
layout.className = 'layout';
app.appendChild(layout);

const controlPanel = document.createElement('aside');
controlPanel.className = 'control-panel';
const mapPanel = document.createElement('section');
mapPanel.className = 'map-panel';
layout.appendChild(controlPanel);
layout.appendChild(mapPanel);

const title = document.createElement('div');
title.className = 'panel-title';
title.innerHTML = `
  <span class="section-heading">COVID-19 in U.S. counties</span>
  <h1>Where are cases growing?</h1>
  <p class="input-description">Circle size follows confirmed cases; colour follows the average daily growth over the last five days, weighted toward the most recent.</p>
`;
controlPanel.appendChild(title);

const loading = document.createElement('div');
loading.className = 'loading';
loading.textContent = 'Loading case data…';
mapPanel.appendChild(loading);

const state: AppState = {
  redRate: parseHash().rate ?? config.defaultRedRate,
  model: null
};

let table: CaseTable | null = null;
let mapInstance: CaseMap | null = null;
let summaryBadge: HTMLDivElement | null = null;

const control = new ThresholdControl(controlPanel, {
  initial: state.redRate,
  onCommit: (value) => {
    state.redRate = value;
    updateHash(value);
    updateVisualization();
  }
});

const hotspots = new HotspotList(controlPanel, (fips) => {
  if (!mapInstance) return;
  mapInstance.focusOnCounty(fips);
  mapInstance.flashCounty(fips);
});

window.addEventListener('hashchange', () => {
  const rate = parseHash().rate;
  if (rate == null || rate === state.redRate) return;
  state.redRate = rate;
  control.setValue(rate);
  updateVisualization();
});

function updateVisualization() {
  if (!table || !mapInstance) return;
  state.model = renderMap(table.counties, state.redRate, { logger });
  mapInstance.update(state.model);
  hotspots.update(rankByRate(state.model.circles));
  if (summaryBadge) {
    const latestDate = table.dates[table.dates.length - 1] ?? '';
    summaryBadge.textContent = `${formatCount(state.model.circles.length)} counties with cases as of ${latestDate}`;
  }
}

const geographyLoad = loadGeography();

loadCaseTable(config, { logger })
  .andThen((loaded) => geographyLoad.map((geography) => ({ loaded, geography })))
  .match(
    ({ loaded, geography }) => {
      table = loaded;

      const mapContainer = document.createElement('div');
      mapContainer.className = 'map-container';
      mapPanel.appendChild(mapContainer);

      mapInstance = new CaseMap(mapContainer, geography, {
        onSelect: (circle) => mapInstance?.flashCounty(circle.fips)
      });

      summaryBadge = document.createElement('div');
      summaryBadge.className = 'summary-badge';
      mapPanel.appendChild(summaryBadge);

      updateVisualization();
      mapPanel.removeChild(loading);
    },
    (error) => {
      if (error.type === 'GeographyError') {
        logger.error({ error }, 'base map failed to load');
      }
      loading.textContent = describeLoadError(error);
    }
  )
  .catch((error: unknown) => {
    logger.error({ error }, 'map failed to draw');
    loading.textContent = 'The map could not be drawn. See the console for details.';
  });
