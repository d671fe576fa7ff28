import { unparse } from 'papaparse';
import { MPS_TO_KMH } from './aircraftState';
import type { Observation } from '../types/observation.types';

export interface CsvExportOptions {
  includeDetails?: boolean;
}

const BASE_COLUMNS = ['callsign', 'speed_kmh', 'altitude_m'];
const DETAIL_COLUMNS = ['origin_country', 'vertical_rate_mps'];

function toRow(observation: Observation, includeDetails: boolean): string[] {
  const row = [
    observation.callsign,
    (observation.groundSpeedMps * MPS_TO_KMH).toFixed(1),
    observation.altitudeM.toFixed(1),
  ];
  if (includeDetails) {
    row.push(observation.originCountry, observation.verticalRateMps.toFixed(2));
  }
  return row;
}

/**
 * Delimited export: header row, then one row per observation, `\n` terminated
 */
export function toCsv(observations: Observation[], options: CsvExportOptions = {}): string {
  const includeDetails = options.includeDetails === true;
  const header = includeDetails ? [...BASE_COLUMNS, ...DETAIL_COLUMNS] : BASE_COLUMNS;
  const rows = observations.map((observation) => toRow(observation, includeDetails));
  return `${unparse([header, ...rows], { newline: '\n' })}\n`;
}
