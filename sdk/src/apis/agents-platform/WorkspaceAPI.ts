import { compact } from '../../http/body';
import { ApiTransport } from '../../transport';
import { DashboardSettingsInput, JsonObject } from '../../types';

/**
 * Configurações de agentes no nível do workspace
 */
export class WorkspaceAPI {
  constructor(private readonly client: ApiTransport) {}

  async getSettings(): Promise<JsonObject> {
    return this.client.get('/v1/convai/settings');
  }

  /** Atualiza webhooks, timeouts e demais configurações do workspace */
  async updateSettings(params: JsonObject): Promise<JsonObject> {
    return this.client.patch('/v1/convai/settings', compact(params));
  }

  async getDashboardSettings(): Promise<JsonObject> {
    return this.client.get('/v1/convai/settings/dashboard');
  }

  async updateDashboardSettings(params: DashboardSettingsInput = {}): Promise<JsonObject> {
    return this.client.patch('/v1/convai/settings/dashboard', compact(params));
  }
}
