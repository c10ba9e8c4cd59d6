export interface CountyRecord {
  uid: string;
  fips: string;
  county: string;
  state: string;
  lat: number | null;
  lon: number | null;
  cases: number[];
}

export interface CaseTable {
  dates: string[];
  counties: CountyRecord[];
}

export interface LatLon {
  lat: number;
  lon: number;
}

export interface CircleSpec {
  fips: string;
  county: string;
  state: string;
  center: LatLon;
  cases: number;
  rate: number;
  /** Metres on the ground. */
  radius: number;
  color: string;
  tooltip: string;
}

export interface MapModel {
  center: LatLon;
  zoom: number;
  threshold: number;
  circles: CircleSpec[];
  skipped: string[];
}

export interface AppState {
  redRate: number;
  model: MapModel | null;
}

export interface Hotspot {
  fips: string;
  county: string;
  state: string;
  rate: number;
  cases: number;
}
