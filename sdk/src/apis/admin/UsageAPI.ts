import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { CharacterStatsQuery, JsonObject } from '../../types';

export class UsageAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Uso de caracteres no intervalo [start_unix, end_unix] (ms) */
  async getCharacterStats(query: CharacterStatsQuery): Promise<JsonObject> {
    requireParams({ start_unix: query.start_unix, end_unix: query.end_unix });
    return this.client.get('/v1/usage/character-stats', query);
  }
}
