/**
 * ELEVENLABS SDK - Cliente HTTP
 *
 * Cliente tipado para integração com a API ElevenLabs.
 * Usa fetch nativo (Node 20+).
 */

import { ElevenLabsConfig, ConfigInput, Environment, loadConfig } from './config';
import {
  NetworkError,
  ResponseMetadata,
  createErrorFromResponse
} from './errors';
import { buildFormData } from './http/multipart';
import { readChunks, readJsonLines, untilAborted } from './http/streaming';
import { withQuery } from './http/url';
import { createLogger, Logger } from './logger';
import {
  ApiTransport,
  HttpMethod,
  RequestOptions,
  RequestResult,
  StreamOptions
} from './transport';
import { MultipartPayload, QueryInput } from './types';

import {
  AgentsAPI,
  AgentTestsAPI,
  BatchCallingAPI,
  ConversationsAPI,
  KnowledgeBaseAPI,
  LlmUsageAPI,
  McpServersAPI,
  OutboundCallingAPI,
  PhoneNumbersAPI,
  SecretsAPI,
  TestInvocationsAPI,
  ToolsAPI,
  WidgetsAPI,
  WorkspaceAPI
} from './apis/agents-platform';
import {
  HistoryAPI,
  ModelsAPI,
  PronunciationDictionariesAPI,
  SamplesAPI,
  ServiceAccountApiKeysAPI,
  ServiceAccountsAPI,
  UsageAPI,
  UserAPI,
  VoiceLibraryAPI,
  WebhooksAPI,
  WorkspaceGroupsAPI,
  WorkspaceInvitesAPI,
  WorkspaceMembersAPI,
  WorkspaceResourcesAPI
} from './apis/admin';
import {
  AudioIsolationAPI,
  AudioNativeAPI,
  DubbingAPI,
  ForcedAlignmentAPI,
  MusicAPI,
  SoundGenerationAPI,
  SpeechToSpeechAPI,
  SpeechToTextAPI,
  TextToDialogueAPI,
  TextToSpeechAPI,
  TextToVoiceAPI,
  VoicesAPI
} from './apis/audio';

// ════════════════════════════════════════════════════════════════════════════
// CONFIGURAÇÃO
// ════════════════════════════════════════════════════════════════════════════

export const SDK_VERSION = '0.1.0';
const USER_AGENT = `elevenlabs-client-ts/${SDK_VERSION}`;

/**
 * Opções de configuração do cliente
 */
export interface ElevenLabsClientOptions extends ConfigInput {
  /** Implementacao de fetch (default: globalThis.fetch) */
  fetch?: typeof fetch;
  /** Logger pino existente; se omitido, um novo e criado com logLevel */
  logger?: Logger;
  /** Ambiente usado na resolucao (default: process.env) */
  env?: Environment;
}

interface SendOptions {
  query?: QueryInput;
  body?: unknown;
  form?: MultipartPayload;
  headers?: Record<string, string>;
  accept: string;
}

/**
 * Troca HTTP em andamento: resposta recebida, corpo ainda nao consumido
 */
interface Exchange {
  method: HttpMethod;
  path: string;
  response: Response;
  signal: AbortSignal;
  /** Desarma o timeout */
  release(): void;
}

// ════════════════════════════════════════════════════════════════════════════
// CLIENTE PRINCIPAL
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cliente ElevenLabs SDK
 *
 * @example
 * ```typescript
 * const client = createElevenLabsClient({ apiKey: process.env.ELEVENLABS_API_KEY });
 *
 * const { agent_id } = await client.agents.create({
 *   name: 'Support Agent',
 *   conversation_config: { agent: { first_message: 'Hi!' } }
 * });
 *
 * for await (const chunk of client.textToSpeech.stream(voiceId, 'Hello')) {
 *   output.write(chunk);
 * }
 * ```
 */
export class ElevenLabsClient implements ApiTransport {
  private readonly config: ElevenLabsConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  // Agents platform
  public readonly agents: AgentsAPI;
  public readonly conversations: ConversationsAPI;
  public readonly knowledgeBase: KnowledgeBaseAPI;
  public readonly tools: ToolsAPI;
  public readonly workspace: WorkspaceAPI;
  public readonly secrets: SecretsAPI;
  public readonly batchCalling: BatchCallingAPI;
  public readonly phoneNumbers: PhoneNumbersAPI;
  public readonly llmUsage: LlmUsageAPI;
  public readonly mcpServers: McpServersAPI;
  public readonly outboundCalling: OutboundCallingAPI;
  public readonly tests: AgentTestsAPI;
  public readonly testInvocations: TestInvocationsAPI;
  public readonly widgets: WidgetsAPI;

  // Admin
  public readonly history: HistoryAPI;
  public readonly models: ModelsAPI;
  public readonly usage: UsageAPI;
  public readonly user: UserAPI;
  public readonly webhooks: WebhooksAPI;
  public readonly voiceLibrary: VoiceLibraryAPI;
  public readonly workspaceMembers: WorkspaceMembersAPI;
  public readonly workspaceResources: WorkspaceResourcesAPI;
  public readonly workspaceGroups: WorkspaceGroupsAPI;
  public readonly workspaceInvites: WorkspaceInvitesAPI;
  public readonly serviceAccounts: ServiceAccountsAPI;
  public readonly serviceAccountApiKeys: ServiceAccountApiKeysAPI;
  public readonly samples: SamplesAPI;
  public readonly pronunciationDictionaries: PronunciationDictionariesAPI;

  // Audio
  public readonly textToSpeech: TextToSpeechAPI;
  public readonly textToDialogue: TextToDialogueAPI;
  public readonly voices: VoicesAPI;
  public readonly soundGeneration: SoundGenerationAPI;
  public readonly speechToText: SpeechToTextAPI;
  public readonly speechToSpeech: SpeechToSpeechAPI;
  public readonly audioIsolation: AudioIsolationAPI;
  public readonly music: MusicAPI;
  public readonly textToVoice: TextToVoiceAPI;
  public readonly forcedAlignment: ForcedAlignmentAPI;
  public readonly audioNative: AudioNativeAPI;
  public readonly dubbing: DubbingAPI;

  constructor(options: ElevenLabsClientOptions = {}) {
    const { fetch: fetchImpl, logger, env, ...configInput } = options;

    this.config = loadConfig(configInput, env);
    this.fetchImpl = fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.logger = logger ?? createLogger(this.config.logLevel);

    this.agents = new AgentsAPI(this);
    this.conversations = new ConversationsAPI(this);
    this.knowledgeBase = new KnowledgeBaseAPI(this);
    this.tools = new ToolsAPI(this);
    this.workspace = new WorkspaceAPI(this);
    this.secrets = new SecretsAPI(this);
    this.batchCalling = new BatchCallingAPI(this);
    this.phoneNumbers = new PhoneNumbersAPI(this);
    this.llmUsage = new LlmUsageAPI(this);
    this.mcpServers = new McpServersAPI(this);
    this.outboundCalling = new OutboundCallingAPI(this);
    this.tests = new AgentTestsAPI(this);
    this.testInvocations = new TestInvocationsAPI(this);
    this.widgets = new WidgetsAPI(this);

    this.history = new HistoryAPI(this);
    this.models = new ModelsAPI(this);
    this.usage = new UsageAPI(this);
    this.user = new UserAPI(this);
    this.webhooks = new WebhooksAPI(this);
    this.voiceLibrary = new VoiceLibraryAPI(this);
    this.workspaceMembers = new WorkspaceMembersAPI(this);
    this.workspaceResources = new WorkspaceResourcesAPI(this);
    this.workspaceGroups = new WorkspaceGroupsAPI(this);
    this.workspaceInvites = new WorkspaceInvitesAPI(this);
    this.serviceAccounts = new ServiceAccountsAPI(this);
    this.serviceAccountApiKeys = new ServiceAccountApiKeysAPI(this);
    this.samples = new SamplesAPI(this);
    this.pronunciationDictionaries = new PronunciationDictionariesAPI(this);

    this.textToSpeech = new TextToSpeechAPI(this);
    this.textToDialogue = new TextToDialogueAPI(this);
    this.voices = new VoicesAPI(this);
    this.soundGeneration = new SoundGenerationAPI(this);
    this.speechToText = new SpeechToTextAPI(this);
    this.speechToSpeech = new SpeechToSpeechAPI(this);
    this.audioIsolation = new AudioIsolationAPI(this);
    this.music = new MusicAPI(this);
    this.textToVoice = new TextToVoiceAPI(this);
    this.forcedAlignment = new ForcedAlignmentAPI(this);
    this.audioNative = new AudioNativeAPI(this);
    this.dubbing = new DubbingAPI(this);
  }

  /** URL base resolvida */
  get baseUrl(): string {
    return this.config.baseUrl;
  }

  // ════════════════════════════════════════════════════════════════════════
  // JSON
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Executa requisição HTTP e decodifica o corpo JSON
   */
  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RequestResult<T>> {
    const exchange = await this.send(method, path, { ...options, accept: 'application/json' });
    const metadata = this.metadataOf(exchange.response);

    const text = await this.readBody(exchange, response => response.text());
    let data: unknown = {};
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        // Resposta 2xx nao-JSON: devolve o texto
        data = text;
      }
    }

    return {
      data: data as T,
      metadata
    };
  }

  /**
   * Executa requisição e retorna apenas os dados (sem metadados)
   */
  async requestData<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const result = await this.request<T>(method, path, options);
    return result.data;
  }

  async get<T>(path: string, query?: QueryInput): Promise<T> {
    return this.requestData<T>('GET', path, { query });
  }

  async post<T>(path: string, body?: unknown, query?: QueryInput): Promise<T> {
    return this.requestData<T>('POST', path, { body, query });
  }

  async patch<T>(path: string, body?: unknown): Promise<T> {
    return this.requestData<T>('PATCH', path, { body });
  }

  async put<T>(path: string, body?: unknown): Promise<T> {
    return this.requestData<T>('PUT', path, { body });
  }

  async delete<T>(path: string, options: { query?: QueryInput; body?: unknown } = {}): Promise<T> {
    return this.requestData<T>('DELETE', path, options);
  }

  async postMultipart<T>(path: string, form: MultipartPayload, query?: QueryInput): Promise<T> {
    return this.requestData<T>('POST', path, { form, query });
  }

  // ════════════════════════════════════════════════════════════════════════
  // BINARIO
  // ════════════════════════════════════════════════════════════════════════

  /**
   * GET com corpo bruto (audio, arquivos PLS)
   */
  async getBinary(path: string, query?: QueryInput): Promise<Buffer> {
    return this.binary('GET', path, { query, accept: '*/*' });
  }

  /**
   * POST JSON com corpo bruto na resposta
   */
  async postBinary(path: string, body?: unknown, query?: QueryInput, accept = '*/*'): Promise<Buffer> {
    return this.binary('POST', path, { body, query, accept });
  }

  /**
   * POST multipart com corpo bruto na resposta (conversao de voz, isolamento)
   */
  async postMultipartBinary(path: string, form: MultipartPayload, query?: QueryInput): Promise<Buffer> {
    return this.binary('POST', path, { form, query, accept: '*/*' });
  }

  // ════════════════════════════════════════════════════════════════════════
  // STREAMING
  // ════════════════════════════════════════════════════════════════════════

  /**
   * POST com resposta em chunks, entregues na ordem de chegada.
   * Erros de status sao lancados na primeira iteracao, antes de qualquer chunk.
   */
  postStream(path: string, body?: unknown, options: StreamOptions = {}): AsyncGenerator<Uint8Array, void, unknown> {
    return this.stream('POST', path, {
      body,
      query: options.query,
      accept: options.accept ?? 'audio/mpeg'
    });
  }

  /**
   * POST multipart com resposta em chunks
   */
  postMultipartStream(path: string, form: MultipartPayload, options: StreamOptions = {}): AsyncGenerator<Uint8Array, void, unknown> {
    return this.stream('POST', path, {
      form,
      query: options.query,
      accept: options.accept ?? 'audio/mpeg'
    });
  }

  /**
   * GET com resposta em chunks (preview de voz gerada)
   */
  getStream(path: string, options: StreamOptions = {}): AsyncGenerator<Uint8Array, void, unknown> {
    return this.stream('GET', path, {
      query: options.query,
      accept: options.accept ?? 'audio/mpeg'
    });
  }

  /**
   * POST com resposta em JSON delimitado por newline
   */
  async *postJsonLines<T>(path: string, body?: unknown, options: { query?: QueryInput } = {}): AsyncGenerator<T, void, unknown> {
    yield* readJsonLines<T>(this.postStream(path, body, { query: options.query, accept: 'application/json' }));
  }

  // ════════════════════════════════════════════════════════════════════════
  // INTERNOS
  // ════════════════════════════════════════════════════════════════════════

  private async binary(method: HttpMethod, path: string, options: SendOptions): Promise<Buffer> {
    const exchange = await this.send(method, path, options);
    return Buffer.from(await this.readBody(exchange, response => response.arrayBuffer()));
  }

  private async *stream(method: HttpMethod, path: string, options: SendOptions): AsyncGenerator<Uint8Array, void, unknown> {
    const exchange = await this.send(method, path, options);
    try {
      if (exchange.response.body) {
        yield* readChunks(exchange.response.body, exchange.signal);
      }
    } catch (error: unknown) {
      throw this.networkError(error, exchange);
    } finally {
      exchange.release();
    }
  }

  /**
   * Le o corpo com o timeout ainda armado; falhas viram NetworkError
   */
  private async readBody<T>(exchange: Exchange, read: (response: Response) => Promise<T>): Promise<T> {
    try {
      return await untilAborted(read(exchange.response), exchange.signal);
    } catch (error: unknown) {
      throw this.networkError(error, exchange);
    } finally {
      exchange.release();
    }
  }

  /**
   * Executa uma troca HTTP; lanca erro tipado para status nao-2xx.
   * Em caso de sucesso o timeout segue armado ate o corpo ser consumido.
   */
  private async send(method: HttpMethod, path: string, options: SendOptions): Promise<Exchange> {
    const logPath = withQuery(path, options.query);
    const url = `${this.config.baseUrl}${logPath}`;

    const headers: Record<string, string> = {
      Accept: options.accept,
      'User-Agent': USER_AGENT,
      'xi-api-key': this.config.apiKey,
      ...this.config.customHeaders,
      ...(options.headers ?? {})
    };

    let requestBody: string | FormData | undefined;
    if (options.form) {
      requestBody = await buildFormData(options.form);
    } else if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      requestBody = JSON.stringify(options.body);
    }

    const startedAt = Date.now();
    const controller = new AbortController();
    const timeoutId = this.config.timeout !== undefined
      ? setTimeout(() => controller.abort(), this.config.timeout)
      : undefined;
    const pending = {
      method,
      path: logPath,
      signal: controller.signal,
      release: () => {
        if (timeoutId !== undefined) {
          clearTimeout(timeoutId);
        }
      }
    };

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: requestBody,
        signal: controller.signal
      });
    } catch (error: unknown) {
      pending.release();
      throw this.networkError(error, pending);
    }

    const exchange: Exchange = { ...pending, response };
    const durationMs = Date.now() - startedAt;

    if (response.ok) {
      this.logger.debug({ method, path: logPath, status: response.status, durationMs }, 'request completed');
      return exchange;
    }

    const metadata = this.metadataOf(response);
    const error = createErrorFromResponse(
      response.status,
      await this.readBody(exchange, body => this.readErrorBody(body)),
      metadata.requestId,
      metadata.headers
    );
    this.logger.warn(
      { method, path: logPath, status: response.status, durationMs, requestId: metadata.requestId },
      error.message
    );
    throw error;
  }

  /**
   * Converte falha de transporte (conexao, leitura do corpo, timeout) e registra
   */
  private networkError(error: unknown, context: Omit<Exchange, 'response'>): NetworkError {
    const cause = error instanceof Error ? error : undefined;
    const timedOut = context.signal.aborted || (error instanceof Error && error.name === 'AbortError');
    const networkError = timedOut
      ? new NetworkError(`Request timeout after ${this.config.timeout}ms`, cause)
      : new NetworkError(`Network error: ${error instanceof Error ? error.message : 'Unknown error'}`, cause);
    this.logger.error({ method: context.method, path: context.path, err: networkError.message }, 'request failed');
    return networkError;
  }

  private metadataOf(response: Response): ResponseMetadata {
    return {
      status: response.status,
      requestId: response.headers.get('x-request-id') ?? undefined,
      headers: Object.fromEntries(response.headers.entries())
    };
  }

  private async readErrorBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cria cliente ElevenLabs SDK
 *
 * @example
 * ```typescript
 * // Chave explicita
 * const client = createElevenLabsClient({ apiKey: 'my-key' });
 *
 * // Chave e URL vindas de ELEVENLABS_API_KEY / ELEVENLABS_BASE_URL
 * const fromEnv = createElevenLabsClient();
 * ```
 */
export function createElevenLabsClient(options: ElevenLabsClientOptions = {}): ElevenLabsClient {
  return new ElevenLabsClient(options);
}
