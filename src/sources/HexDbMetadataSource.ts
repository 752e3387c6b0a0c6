import axios from 'axios';
import type { AircraftMetadata, MetadataSource } from '../types/Aircraft';
import { UpstreamSource } from '../services/UpstreamSource';
import { normalizeAircraftId } from '../utils/aircraftId';
import { NotFoundError } from '../utils/errors';
import { cleanText } from '../utils/text';

/**
 * Aircraft registry lookups from hexdb.io
 * GET /aircraft/{icao24}
 */

interface HexDbAircraft {
  ModeS?: string;
  Registration?: string | null;
  Manufacturer?: string | null;
  ICAOTypeCode?: string | null;
  Type?: string | null;
  RegisteredOwners?: string | null;
  OperatorFlagCode?: string | null;
}

export const DEFAULT_HEXDB_API_URL = 'https://hexdb.io/api/v1';

export class HexDbMetadataSource extends UpstreamSource implements MetadataSource {
  constructor(options: { baseUrl?: string; timeoutMs?: number } = {}) {
    super({ name: 'hexdb', baseUrl: options.baseUrl ?? DEFAULT_HEXDB_API_URL, timeoutMs: options.timeoutMs });
  }

  async fetchMetadata(id: string, signal?: AbortSignal): Promise<AircraftMetadata> {
    const key = normalizeAircraftId(id);

    let record: HexDbAircraft | null;
    try {
      record = await this.get<HexDbAircraft | null>(`aircraft/${encodeURIComponent(key)}`, { signal });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new NotFoundError(`hexdb has no record of ${key}`, { cause: error });
      }
      throw error;
    }

    const metadata: AircraftMetadata = {
      id: key,
      aircraftType: cleanText(record?.Type) ?? cleanText(record?.ICAOTypeCode),
      manufacturer: cleanText(record?.Manufacturer),
      operator: cleanText(record?.RegisteredOwners),
      registration: cleanText(record?.Registration),
      fetchedAtUtc: new Date(),
    };

    if (!metadata.aircraftType && !metadata.registration && !metadata.operator) {
      throw new NotFoundError(`hexdb returned an empty record for ${key}`);
    }

    return metadata;
  }
}
