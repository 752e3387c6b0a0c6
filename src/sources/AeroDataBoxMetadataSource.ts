import axios from 'axios';
import type { AircraftMetadata, MetadataSource } from '../types/Aircraft';
import { UpstreamSource } from '../services/UpstreamSource';
import { normalizeAircraftId } from '../utils/aircraftId';
import { NotFoundError } from '../utils/errors';
import { cleanText } from '../utils/text';

/**
 * Aircraft details from AeroDataBox, served through RapidAPI
 * GET /v2/aircraft/{icao24}
 */

interface AeroDataBoxAircraft {
  model?: string | null;
  typeName?: string | null;
  manufacturer?: string | null;
  registration?: string | null;
  reg?: string | null;
  operator?: string | null;
  airlineName?: string | null;
}

export interface AeroDataBoxOptions {
  apiKey: string;
  apiHost?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export const DEFAULT_AERODATABOX_API_HOST = 'aerodatabox.p.rapidapi.com';
export const DEFAULT_AERODATABOX_API_URL = `https://${DEFAULT_AERODATABOX_API_HOST}`;

export class AeroDataBoxMetadataSource extends UpstreamSource implements MetadataSource {
  private readonly headers: Record<string, string>;

  constructor(options: AeroDataBoxOptions) {
    super({
      name: 'aerodatabox',
      baseUrl: options.baseUrl ?? DEFAULT_AERODATABOX_API_URL,
      timeoutMs: options.timeoutMs,
    });
    this.headers = {
      'x-rapidapi-key': options.apiKey,
      'x-rapidapi-host': options.apiHost ?? DEFAULT_AERODATABOX_API_HOST,
    };
  }

  async fetchMetadata(id: string, signal?: AbortSignal): Promise<AircraftMetadata> {
    const key = normalizeAircraftId(id);

    let record: AeroDataBoxAircraft | null;
    try {
      record = await this.get<AeroDataBoxAircraft | null>(`v2/aircraft/${encodeURIComponent(key)}`, {
        headers: this.headers,
        signal,
      });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new NotFoundError(`AeroDataBox has no record of ${key}`, { cause: error });
      }
      throw error;
    }

    const metadata: AircraftMetadata = {
      id: key,
      aircraftType: cleanText(record?.model) ?? cleanText(record?.typeName),
      manufacturer: cleanText(record?.manufacturer),
      operator: cleanText(record?.operator) ?? cleanText(record?.airlineName),
      registration: cleanText(record?.registration) ?? cleanText(record?.reg),
      fetchedAtUtc: new Date(),
    };

    // Nothing to show: let the next source try
    if (!metadata.aircraftType && !metadata.manufacturer && !metadata.registration) {
      throw new NotFoundError(`AeroDataBox returned an empty record for ${key}`);
    }

    return metadata;
  }
}
