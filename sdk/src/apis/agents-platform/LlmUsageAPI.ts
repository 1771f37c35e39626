import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, LlmUsageInput } from '../../types';

/**
 * Estimativa de custo de LLM por tamanho de prompt e base de conhecimento
 */
export class LlmUsageAPI {
  constructor(private readonly client: ApiTransport) {}

  async calculate(params: LlmUsageInput): Promise<JsonObject> {
    requireParams({
      prompt_length: params.prompt_length,
      number_of_pages: params.number_of_pages,
      rag_enabled: params.rag_enabled
    });
    return this.client.post('/v1/convai/llm-usage/calculate', {
      prompt_length: params.prompt_length,
      number_of_pages: params.number_of_pages,
      rag_enabled: params.rag_enabled
    });
  }
}
