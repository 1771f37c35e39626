/**
 * Conversas registradas (/v1/convai/conversations)
 */

import { apiPath } from '../../http/url';
import { requireOneOf, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import {
  ConversationFeedback,
  ConversationListQuery,
  ConversationTokenQuery,
  ConversationTokenResponse,
  JsonObject,
  SignedUrlQuery,
  SignedUrlResponse
} from '../../types';

const FEEDBACK_VALUES: readonly ConversationFeedback[] = ['like', 'dislike'];

export class ConversationsAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Lista conversas com filtros opcionais */
  async list(query: ConversationListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/convai/conversations', query);
  }

  /** Detalhes e transcrição de uma conversa */
  async get(conversationId: string): Promise<JsonObject> {
    requireParam('conversationId', conversationId);
    return this.client.get(apiPath`/v1/convai/conversations/${conversationId}`);
  }

  async delete(conversationId: string): Promise<JsonObject> {
    requireParam('conversationId', conversationId);
    return this.client.delete(apiPath`/v1/convai/conversations/${conversationId}`);
  }

  /** Áudio gravado da conversa (bytes) */
  async getAudio(conversationId: string): Promise<Buffer> {
    requireParam('conversationId', conversationId);
    return this.client.getBinary(apiPath`/v1/convai/conversations/${conversationId}/audio`);
  }

  /** URL assinada para iniciar conversa com agente privado */
  async getSignedUrl(agentId: string, query: SignedUrlQuery = {}): Promise<SignedUrlResponse> {
    requireParam('agentId', agentId);
    return this.client.get('/v1/convai/conversation/get-signed-url', { agent_id: agentId, ...query });
  }

  /** Token WebRTC para conversa */
  async getToken(agentId: string, query: ConversationTokenQuery = {}): Promise<ConversationTokenResponse> {
    requireParam('agentId', agentId);
    return this.client.get('/v1/convai/conversation/token', { agent_id: agentId, ...query });
  }

  /** Envia avaliação da conversa: 'like' ou 'dislike' */
  async sendFeedback(conversationId: string, feedback: ConversationFeedback): Promise<JsonObject> {
    requireParam('conversationId', conversationId);
    requireOneOf('feedback', feedback, FEEDBACK_VALUES);
    return this.client.post(apiPath`/v1/convai/conversations/${conversationId}/feedback`, { feedback });
  }
}
