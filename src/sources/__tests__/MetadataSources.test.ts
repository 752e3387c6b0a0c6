import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import { AeroDataBoxMetadataSource } from '../AeroDataBoxMetadataSource';
import { HexDbMetadataSource } from '../HexDbMetadataSource';
import { OpenSkyMetadataSource } from '../OpenSkyMetadataSource';
import { FallbackMetadataSource } from '../FallbackMetadataSource';
import { OpenSkyAuthService } from '../OpenSkyAuthService';
import { NotFoundError, UpstreamError } from '../../utils/errors';
import type { AircraftMetadata, MetadataSource } from '../../types/Aircraft';

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, get: vi.fn(), post: vi.fn() } };
});
const mockedGet = vi.mocked(axios.get);

const httpError = (status: number) =>
  new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, {
    data: {},
    status,
    statusText: '',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

const stubSource = (name: string, result: AircraftMetadata | Error): MetadataSource => ({
  getName: () => name,
  fetchMetadata: vi.fn(async () => {
    if (result instanceof Error) throw result;
    return result;
  }),
});

const metadata: AircraftMetadata = {
  id: 'abc123',
  aircraftType: 'A320',
  manufacturer: 'Airbus',
  operator: 'Test Air',
  registration: 'G-TEST',
  fetchedAtUtc: new Date(0),
};

describe('HexDbMetadataSource', () => {
  const source = new HexDbMetadataSource({ baseUrl: 'https://hexdb.test/api/v1' });

  it('should map the registry record', async () => {
    mockedGet.mockResolvedValueOnce({
      data: {
        ModeS: '400ABC',
        Registration: 'G-TEST',
        Manufacturer: 'Airbus',
        ICAOTypeCode: 'A320',
        Type: 'A320 214',
        RegisteredOwners: 'Test Air',
      },
    });

    const result = await source.fetchMetadata('ABC123');

    expect(mockedGet.mock.calls[0][0]).toBe('https://hexdb.test/api/v1/aircraft/abc123');
    expect(result).toMatchObject({
      id: 'abc123',
      aircraftType: 'A320 214',
      manufacturer: 'Airbus',
      operator: 'Test Air',
      registration: 'G-TEST',
    });
  });

  it('should fall back to the ICAO type code', async () => {
    mockedGet.mockResolvedValueOnce({ data: { ICAOTypeCode: 'B738', Type: '' } });

    await expect(source.fetchMetadata('abc123')).resolves.toMatchObject({ aircraftType: 'B738', registration: null });
  });

  it('should throw NotFoundError on 404', async () => {
    mockedGet.mockRejectedValueOnce(httpError(404));

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(NotFoundError);
    expect(source.getStats()).toMatchObject({ failures: 0, isHealthy: true });
  });

  it('should throw NotFoundError on an empty record', async () => {
    mockedGet.mockResolvedValueOnce({ data: { status: '404', error: 'Aircraft not found.' } });

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should rethrow server errors', async () => {
    mockedGet.mockRejectedValueOnce(httpError(503));

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(AxiosError);
  });
});

describe('AeroDataBoxMetadataSource', () => {
  const source = new AeroDataBoxMetadataSource({ apiKey: 'test-key', baseUrl: 'https://aerodatabox.test' });

  it('should send the RapidAPI headers and map the record', async () => {
    mockedGet.mockResolvedValueOnce({
      data: {
        model: 'A320-214',
        manufacturer: 'Airbus',
        registration: 'G-TEST',
        operator: 'Test Air',
      },
    });

    const result = await source.fetchMetadata('ABC123');

    expect(mockedGet.mock.calls[0][0]).toBe('https://aerodatabox.test/v2/aircraft/abc123');
    expect(mockedGet.mock.calls[0][1]?.headers).toEqual({
      'x-rapidapi-key': 'test-key',
      'x-rapidapi-host': 'aerodatabox.p.rapidapi.com',
    });
    expect(result).toMatchObject({
      id: 'abc123',
      aircraftType: 'A320-214',
      manufacturer: 'Airbus',
      operator: 'Test Air',
      registration: 'G-TEST',
    });
  });

  it('should fall back to the short field names', async () => {
    mockedGet.mockResolvedValueOnce({ data: { typeName: 'Boeing 737-800', reg: 'G-ABCD', airlineName: 'Test Air' } });

    await expect(source.fetchMetadata('abc123')).resolves.toMatchObject({
      aircraftType: 'Boeing 737-800',
      manufacturer: null,
      operator: 'Test Air',
      registration: 'G-ABCD',
    });
  });

  it('should throw NotFoundError on 404', async () => {
    mockedGet.mockRejectedValueOnce(httpError(404));

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should throw NotFoundError when the record has nothing to show', async () => {
    mockedGet.mockResolvedValueOnce({ data: { operator: 'Test Air' } });

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should rethrow rejected credentials', async () => {
    mockedGet.mockRejectedValueOnce(httpError(403));

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(AxiosError);
    expect(source.getStats()).toMatchObject({ failures: 1, isHealthy: false });
  });
});

describe('OpenSkyMetadataSource', () => {
  const source = new OpenSkyMetadataSource(new OpenSkyAuthService(), { baseUrl: 'https://opensky.test/api' });

  it('should map the aircraft database record', async () => {
    mockedGet.mockResolvedValueOnce({
      data: {
        icao24: 'abc123',
        registration: 'G-TEST',
        manufacturerName: 'Boeing',
        model: '',
        typecode: 'B738',
        operator: '',
        owner: 'Leasing Co',
      },
    });

    const result = await source.fetchMetadata('abc123');

    expect(mockedGet.mock.calls[0][0]).toBe('https://opensky.test/api/metadata/aircraft/icao/abc123');
    expect(result).toMatchObject({
      aircraftType: 'B738',
      manufacturer: 'Boeing',
      operator: 'Leasing Co',
      registration: 'G-TEST',
    });
  });

  it('should throw NotFoundError on 404', async () => {
    mockedGet.mockRejectedValueOnce(httpError(404));

    await expect(source.fetchMetadata('abc123')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('FallbackMetadataSource', () => {
  it('should return the first source that knows the aircraft', async () => {
    const first = stubSource('first', new NotFoundError('unknown'));
    const second = stubSource('second', metadata);
    const third = stubSource('third', metadata);

    const result = await new FallbackMetadataSource([first, second, third]).fetchMetadata('abc123');

    expect(result).toBe(metadata);
    expect(third.fetchMetadata).not.toHaveBeenCalled();
  });

  it('should report not-found only when every source does', async () => {
    const chain = new FallbackMetadataSource([
      stubSource('first', new NotFoundError('unknown')),
      stubSource('second', new NotFoundError('unknown')),
    ]);

    await expect(chain.fetchMetadata('abc123')).rejects.toThrow('No metadata source knows abc123');
  });

  it('should rethrow a transient failure so the caller can retry', async () => {
    const failure = new UpstreamError('timeout');
    const chain = new FallbackMetadataSource([
      stubSource('first', failure),
      stubSource('second', new NotFoundError('unknown')),
    ]);

    await expect(chain.fetchMetadata('abc123')).rejects.toBe(failure);
  });

  it('should name itself after its sources', () => {
    const chain = new FallbackMetadataSource([stubSource('hexdb', metadata), stubSource('opensky', metadata)]);
    expect(chain.getName()).toBe('hexdb+opensky');
  });
});
