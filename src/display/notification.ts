import type { AircraftMetadata, AircraftState } from '../types/Aircraft';
import { BOARD_COLUMNS, linesToGrid, type BoardGrid } from './boardGrid';

const NOT_AVAILABLE = 'N/A';

/**
 * Six board lines describing a newly detected aircraft:
 * callsign and registration, operator and country, type,
 * altitude, speed, heading
 */
export function formatNotification(state: AircraftState, metadata: AircraftMetadata): string[] {
  const callsign = fit(state.callsign ?? 'UNKNOWN');
  const registration = fit(metadata.registration ?? '');
  const operator = fit(metadata.operator ?? '');
  const country = fit(state.originCountry ?? '');

  return [
    `${callsign}   ${registration}`.trim(),
    `${operator}  ${country}`.trim(),
    fit(describeType(metadata)),
    state.altitude === null ? NOT_AVAILABLE : `${Math.round(state.altitude).toLocaleString('en-US')} ft`,
    state.groundSpeed === null ? NOT_AVAILABLE : `${Math.round(state.groundSpeed)} knots`,
    state.heading === null ? NOT_AVAILABLE : `${Math.round(state.heading)}°`,
  ];
}

export function buildNotificationGrid(state: AircraftState, metadata: AircraftMetadata): BoardGrid {
  return linesToGrid(formatNotification(state, metadata));
}

/**
 * Manufacturer and type, without repeating a manufacturer the type already names
 */
function describeType(metadata: AircraftMetadata): string {
  const manufacturer = metadata.manufacturer?.trim() ?? '';
  const type = metadata.aircraftType?.trim() ?? '';

  if (manufacturer && type) {
    return type.toUpperCase().startsWith(manufacturer.toUpperCase()) ? type : `${manufacturer} ${type}`;
  }
  return manufacturer || type || 'UNKNOWN';
}

function fit(text: string): string {
  return Array.from(text.trim()).slice(0, BOARD_COLUMNS).join('');
}
