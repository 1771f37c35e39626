/**
 * Base de conhecimento dos agentes (/v1/convai/knowledge-base)
 *
 * Documentos podem vir de URL, texto ou arquivo. Cada documento pode ter
 * indices RAG computados por modelo de embedding.
 */

import { compact } from '../../http/body';
import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireOneOf, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import {
  CursorQuery,
  DocumentCreatedResponse,
  JsonObject,
  KnowledgeBaseFileInput,
  KnowledgeBaseListQuery,
  RagEmbeddingModel
} from '../../types';

const BASE_PATH = '/v1/convai/knowledge-base';

export const RAG_EMBEDDING_MODELS: readonly RagEmbeddingModel[] = [
  'e5_mistral_7b_instruct',
  'multilingual_e5_large_instruct'
];

export class KnowledgeBaseAPI {
  constructor(private readonly client: ApiTransport) {}

  // ════════════════════════════════════════════════════════════════════════
  // DOCUMENTOS
  // ════════════════════════════════════════════════════════════════════════

  /** Lista documentos; `types` vira chave repetida na query */
  async list(query: KnowledgeBaseListQuery = {}): Promise<JsonObject> {
    return this.client.get(BASE_PATH, query);
  }

  async get(documentId: string, query: { agent_id?: string } = {}): Promise<JsonObject> {
    requireParam('documentId', documentId);
    return this.client.get(apiPath`/v1/convai/knowledge-base/${documentId}`, query);
  }

  /** Renomeia documento */
  async update(documentId: string, params: { name: string }): Promise<JsonObject> {
    requireParam('documentId', documentId);
    requireParam('name', params.name);
    return this.client.patch(apiPath`/v1/convai/knowledge-base/${documentId}`, { name: params.name });
  }

  /**
   * Remove documento. Com `force: true` remove mesmo se houver agentes
   * dependentes.
   */
  async delete(documentId: string, options: { force?: boolean } = {}): Promise<JsonObject> {
    requireParam('documentId', documentId);
    return this.client.delete(apiPath`/v1/convai/knowledge-base/${documentId}`, {
      query: { force: options.force }
    });
  }

  async createFromUrl(url: string, options: { name?: string } = {}): Promise<DocumentCreatedResponse> {
    requireParam('url', url);
    return this.client.post(`${BASE_PATH}/url`, compact({ url, name: options.name }));
  }

  async createFromText(text: string, options: { name?: string } = {}): Promise<DocumentCreatedResponse> {
    requireParam('text', text);
    return this.client.post(`${BASE_PATH}/text`, compact({ text, name: options.name }));
  }

  /** Upload de arquivo (pdf, txt, docx, html, epub, md) */
  async createFromFile(input: KnowledgeBaseFileInput): Promise<DocumentCreatedResponse> {
    requireParam('file', input.file);
    requireParam('filename', input.filename);
    return this.client.postMultipart(`${BASE_PATH}/file`, {
      file: filePart(input.file, input.filename),
      name: input.name
    });
  }

  // ════════════════════════════════════════════════════════════════════════
  // RAG
  // ════════════════════════════════════════════════════════════════════════

  /** Dispara (ou consulta) o cálculo de índice RAG */
  async computeRagIndex(documentId: string, params: { model: RagEmbeddingModel }): Promise<JsonObject> {
    requireParam('documentId', documentId);
    requireOneOf('model', params.model, RAG_EMBEDDING_MODELS);
    return this.client.post(apiPath`/v1/convai/knowledge-base/${documentId}/rag-index`, {
      model: params.model
    });
  }

  async getRagIndex(documentId: string): Promise<JsonObject> {
    requireParam('documentId', documentId);
    return this.client.get(apiPath`/v1/convai/knowledge-base/${documentId}/rag-index`);
  }

  async deleteRagIndex(documentId: string, ragIndexId: string): Promise<JsonObject> {
    requireParam('documentId', documentId);
    requireParam('ragIndexId', ragIndexId);
    return this.client.delete(apiPath`/v1/convai/knowledge-base/${documentId}/rag-index/${ragIndexId}`);
  }

  /** Uso total de índices RAG no workspace */
  async getRagIndexOverview(): Promise<JsonObject> {
    return this.client.get(`${BASE_PATH}/rag-index`);
  }

  // ════════════════════════════════════════════════════════════════════════
  // CONTEUDO / DEPENDENCIAS
  // ════════════════════════════════════════════════════════════════════════

  async getDependentAgents(documentId: string, query: CursorQuery = {}): Promise<JsonObject> {
    requireParam('documentId', documentId);
    return this.client.get(apiPath`/v1/convai/knowledge-base/${documentId}/dependent-agents`, query);
  }

  /** Conteúdo completo do documento */
  async getContent(documentId: string): Promise<JsonObject> {
    requireParam('documentId', documentId);
    return this.client.get(apiPath`/v1/convai/knowledge-base/${documentId}/content`);
  }

  async getChunk(documentId: string, chunkId: string): Promise<JsonObject> {
    requireParam('documentId', documentId);
    requireParam('chunkId', chunkId);
    return this.client.get(apiPath`/v1/convai/knowledge-base/${documentId}/chunk/${chunkId}`);
  }

  /** Tamanho da base de conhecimento de um agente */
  async getAgentKnowledgeBaseSize(agentId: string): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.get(apiPath`/v1/convai/agent/${agentId}/knowledge-base/size`);
  }
}
