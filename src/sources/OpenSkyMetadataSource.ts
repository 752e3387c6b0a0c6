import axios from 'axios';
import type { AircraftMetadata, MetadataSource } from '../types/Aircraft';
import { UpstreamSource } from '../services/UpstreamSource';
import { normalizeAircraftId } from '../utils/aircraftId';
import { NotFoundError } from '../utils/errors';
import { cleanText } from '../utils/text';
import type { OpenSkyAuthService } from './OpenSkyAuthService';
import { DEFAULT_OPENSKY_API_URL } from './OpenSkyStateSource';

interface OpenSkyAircraftRecord {
  icao24?: string;
  registration?: string | null;
  manufacturerName?: string | null;
  model?: string | null;
  typecode?: string | null;
  operator?: string | null;
  owner?: string | null;
}

/**
 * OpenSky aircraft database, used as a fallback registry
 */
export class OpenSkyMetadataSource extends UpstreamSource implements MetadataSource {
  constructor(
    private readonly auth: OpenSkyAuthService,
    options: { baseUrl?: string; timeoutMs?: number } = {}
  ) {
    super({ name: 'opensky-metadata', baseUrl: options.baseUrl ?? DEFAULT_OPENSKY_API_URL, timeoutMs: options.timeoutMs });
  }

  async fetchMetadata(id: string, signal?: AbortSignal): Promise<AircraftMetadata> {
    const key = normalizeAircraftId(id);

    let record: OpenSkyAircraftRecord | null;
    try {
      record = await this.auth.withAuthorization((headers) =>
        this.get<OpenSkyAircraftRecord | null>(`metadata/aircraft/icao/${encodeURIComponent(key)}`, { headers, signal })
      );
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new NotFoundError(`OpenSky has no record of ${key}`, { cause: error });
      }
      throw error;
    }

    const metadata: AircraftMetadata = {
      id: key,
      aircraftType: cleanText(record?.model) ?? cleanText(record?.typecode),
      manufacturer: cleanText(record?.manufacturerName),
      operator: cleanText(record?.operator) ?? cleanText(record?.owner),
      registration: cleanText(record?.registration),
      fetchedAtUtc: new Date(),
    };

    if (!metadata.aircraftType && !metadata.registration && !metadata.operator) {
      throw new NotFoundError(`OpenSky returned an empty record for ${key}`);
    }

    return metadata;
  }
}
