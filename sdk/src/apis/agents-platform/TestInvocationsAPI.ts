import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, ResubmitTestsInput } from '../../types';

/**
 * Execuções de testes de agente
 */
export class TestInvocationsAPI {
  constructor(private readonly client: ApiTransport) {}

  async get(testInvocationId: string): Promise<JsonObject> {
    requireParam('testInvocationId', testInvocationId);
    return this.client.get(apiPath`/v1/convai/test-invocations/${testInvocationId}`);
  }

  /** Reenvia execuções específicas de uma invocação */
  async resubmit(testInvocationId: string, params: ResubmitTestsInput): Promise<JsonObject> {
    requireParam('testInvocationId', testInvocationId);
    requireNonEmptyArray('test_run_ids', params.test_run_ids);
    requireParam('agent_id', params.agent_id);
    return this.client.post(
      apiPath`/v1/convai/test-invocations/${testInvocationId}/resubmit`,
      compact(params)
    );
  }
}
