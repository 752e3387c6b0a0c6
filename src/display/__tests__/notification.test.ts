import { describe, it, expect } from 'vitest';
import { buildNotificationGrid, formatNotification } from '../notification';
import { gridToText } from '../boardGrid';
import type { AircraftMetadata, AircraftState } from '../../types/Aircraft';

const state: AircraftState = {
  id: '400abc',
  position: { latitude: 51.6085, longitude: -0.5545 },
  altitude: 12500.4,
  groundSpeed: 250.2,
  heading: 270,
  verticalRate: 0,
  onGround: false,
  callsign: 'BAW123',
  squawk: '7000',
  originCountry: 'United Kingdom',
  timestampObservedUtc: new Date(0),
};

const metadata: AircraftMetadata = {
  id: '400abc',
  aircraftType: 'A319 131',
  manufacturer: 'Airbus',
  operator: 'British Airways',
  registration: 'G-EUPT',
  fetchedAtUtc: new Date(0),
};

describe('formatNotification', () => {
  it('should lay out the six lines', () => {
    expect(formatNotification(state, metadata)).toEqual([
      'BAW123   G-EUPT',
      'British Airways  United Kingdom',
      'Airbus A319 131',
      '12,500 ft',
      '250 knots',
      '270°',
    ]);
  });

  it('should fill gaps with UNKNOWN and N/A', () => {
    const lines = formatNotification(
      { ...state, callsign: null, originCountry: null, altitude: null, groundSpeed: null, heading: null },
      { ...metadata, aircraftType: null, manufacturer: null, operator: null, registration: null }
    );

    expect(lines).toEqual(['UNKNOWN', '', 'UNKNOWN', 'N/A', 'N/A', 'N/A']);
  });

  it('should not repeat a manufacturer the type already names', () => {
    const lines = formatNotification(state, { ...metadata, aircraftType: 'Airbus A320neo' });
    expect(lines[2]).toBe('Airbus A320neo');
  });

  it('should truncate each part to the board width', () => {
    const lines = formatNotification(state, { ...metadata, operator: 'An Extremely Long Airline Name Ltd' });
    expect(lines[1]).toBe('An Extremely Long Airl  United Kingdom');
  });
});

describe('buildNotificationGrid', () => {
  it('should render the lines on the board', () => {
    expect(gridToText(buildNotificationGrid(state, metadata))).toBe(
      ['BAW123   G-EUPT', 'BRITISH AIRWAYS  UNITE', 'AIRBUS A319 131', '12,500 FT', '250 KNOTS', '270°'].join('\n')
    );
  });
});
