/**
 * ELEVENLABS SDK - Tipos
 *
 * DTOs e interfaces tipadas para a API ElevenLabs.
 * Entidades remotas (agentes, conversas, vozes) sao documentos JSON opacos;
 * aqui ficam apenas os parametros de entrada e as poucas respostas cujo
 * contrato e um identificador.
 */

import type { Readable } from 'stream';

// ════════════════════════════════════════════════════════════════════════════
// JSON
// ════════════════════════════════════════════════════════════════════════════

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Corpo JSON de entrada. Valores null/undefined sao removidos antes do envio.
 */
export type RequestBody = Record<string, unknown>;

// ════════════════════════════════════════════════════════════════════════════
// QUERY
// ════════════════════════════════════════════════════════════════════════════

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | QueryScalar[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/**
 * Parametros de query. Os tipos de query abaixo sao declarados com `type`
 * para serem atribuiveis a este registro.
 */
export type QueryInput = QueryParams;

// ════════════════════════════════════════════════════════════════════════════
// MULTIPART
// ════════════════════════════════════════════════════════════════════════════

export type FileData = Blob | Buffer | Uint8Array | ArrayBuffer | Readable;

/**
 * Arquivo enviado em formulario multipart
 */
export interface FilePart {
  data: FileData;
  filename: string;
  /** Inferido pela extensao de `filename` quando omitido */
  contentType?: string;
}

export type MultipartValue = string | number | boolean | FilePart;
export type MultipartPayload = Record<string, MultipartValue | MultipartValue[] | null | undefined>;

// ════════════════════════════════════════════════════════════════════════════
// PAGINACAO / COMUNS
// ════════════════════════════════════════════════════════════════════════════

export type SortDirection = 'asc' | 'desc';

export type CursorQuery = {
  page_size?: number;
  cursor?: string;
};

export interface ErrorResponseBody {
  detail?: unknown;
  message?: unknown;
  error?: unknown;
  errors?: unknown;
}

// ════════════════════════════════════════════════════════════════════════════
// AGENTS
// ════════════════════════════════════════════════════════════════════════════

export interface AgentCreateInput {
  conversation_config: JsonObject;
  platform_settings?: JsonObject;
  name?: string;
  tags?: string[];
}

export interface AgentUpdateInput {
  conversation_config?: JsonObject;
  platform_settings?: JsonObject;
  name?: string;
  tags?: string[];
}

export type AgentListQuery = CursorQuery & {
  search?: string | null;
  sort_direction?: SortDirection | null;
  sort_by?: 'name' | 'created_at' | null;
};

export interface AgentCreatedResponse {
  agent_id: string;
}

export interface SimulateConversationInput {
  simulation_specification: JsonObject;
  extra_evaluation_criteria?: JsonObject[];
  new_turns_limit?: number;
}

export interface AgentLlmUsageInput {
  prompt_length?: number;
  number_of_pages?: number;
  rag_enabled?: boolean;
}

/**
 * Estimativa de uso de LLM sem agente; `rag_enabled: false` e valor presente
 */
export interface LlmUsageInput {
  prompt_length: number;
  number_of_pages: number;
  rag_enabled: boolean;
}

// ════════════════════════════════════════════════════════════════════════════
// CONVERSATIONS
// ════════════════════════════════════════════════════════════════════════════

export type ConversationListQuery = CursorQuery & {
  agent_id?: string;
  call_successful?: 'success' | 'failure' | 'unknown';
  call_start_before_unix?: number;
  call_start_after_unix?: number;
  user_id?: string;
  summary_mode?: 'exclude' | 'include';
};

export type SignedUrlQuery = {
  include_conversation_id?: boolean;
};

export type ConversationTokenQuery = {
  participant_name?: string;
};

export type ConversationFeedback = 'like' | 'dislike';

export interface SignedUrlResponse {
  signed_url: string;
}

export interface ConversationTokenResponse {
  token: string;
}

// ════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE BASE
// ════════════════════════════════════════════════════════════════════════════

export type KnowledgeBaseDocumentType = 'file' | 'url' | 'text';

export type KnowledgeBaseListQuery = CursorQuery & {
  search?: string;
  show_only_owned_documents?: boolean;
  types?: KnowledgeBaseDocumentType[];
  sort_by?: 'name' | 'created_at' | 'updated_at' | 'size';
  sort_direction?: SortDirection;
};

export interface KnowledgeBaseFileInput {
  file: FileData;
  filename: string;
  name?: string;
}

export type RagEmbeddingModel = 'e5_mistral_7b_instruct' | 'multilingual_e5_large_instruct';

export interface DocumentCreatedResponse {
  id: string;
  name: string;
}

// ════════════════════════════════════════════════════════════════════════════
// TOOLS / MCP
// ════════════════════════════════════════════════════════════════════════════

export interface ToolConfigInput {
  tool_config: JsonObject;
}

export interface McpServerCreateInput {
  config: JsonObject;
}

export type McpApprovalPolicy =
  | 'auto_approve_all'
  | 'require_approval_all'
  | 'require_approval_per_tool';

export interface McpToolApprovalInput {
  tool_name: string;
  tool_description: string;
  input_schema?: JsonObject;
  approval_policy?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// SECRETS / WORKSPACE
// ════════════════════════════════════════════════════════════════════════════

export interface SecretInput {
  name: string;
  value: string;
  type?: string;
}

export interface SecretCreatedResponse {
  secret_id: string;
  name: string;
  type: string;
}

export interface DashboardSettingsInput {
  charts?: JsonObject[] | null;
}

// ════════════════════════════════════════════════════════════════════════════
// TELEFONIA
// ════════════════════════════════════════════════════════════════════════════

export interface BatchCallRecipient {
  phone_number: string;
  conversation_initiation_client_data?: JsonObject;
  [key: string]: JsonValue | undefined;
}

export interface BatchCallSubmitInput {
  call_name: string;
  agent_id: string;
  agent_phone_number_id: string;
  scheduled_time_unix: number;
  recipients: BatchCallRecipient[];
}

export type BatchCallListQuery = {
  limit?: number;
  last_doc?: string;
};

export interface PhoneNumberImportInput {
  phone_number: string;
  label: string;
  provider?: 'twilio' | 'sip_trunk';
  sid?: string;
  token?: string;
  [key: string]: unknown;
}

export interface PhoneNumberUpdateInput {
  agent_id?: string | null;
  [key: string]: unknown;
}

export interface OutboundCallInput {
  agent_id: string;
  agent_phone_number_id: string;
  to_number: string;
  conversation_initiation_client_data?: JsonObject;
  [key: string]: unknown;
}

// ════════════════════════════════════════════════════════════════════════════
// TESTES DE AGENTE
// ════════════════════════════════════════════════════════════════════════════

export interface AgentTestInput {
  name: string;
  chat_history: JsonObject[];
  success_condition: string;
  success_examples: JsonObject[];
  failure_examples: JsonObject[];
  [key: string]: unknown;
}

export type AgentTestListQuery = CursorQuery & {
  search?: string;
};

export interface RunTestsInput {
  tests: JsonObject[];
  agent_config_override?: JsonObject;
  [key: string]: unknown;
}

export interface ResubmitTestsInput {
  test_run_ids: string[];
  agent_id: string;
  agent_config_override?: JsonObject;
  [key: string]: unknown;
}

export type WidgetQuery = {
  conversation_signature?: string;
};

export interface AvatarInput {
  file: FileData;
  filename: string;
}

// ════════════════════════════════════════════════════════════════════════════
// ADMIN
// ════════════════════════════════════════════════════════════════════════════

export type HistoryListQuery = {
  page_size?: number;
  start_after_history_item_id?: string;
  voice_id?: string;
  search?: string;
  source?: 'TTS' | 'STS';
};

export type CharacterStatsQuery = {
  start_unix: number;
  end_unix: number;
  include_workspace_metrics?: boolean;
  breakdown_type?: string;
  aggregation_interval?: string;
  aggregation_bucket_size?: number;
  metric?: string;
};

export type SharedVoicesQuery = {
  page_size?: number;
  category?: string;
  gender?: string;
  age?: string;
  accent?: string;
  language?: string;
  locale?: string;
  search?: string;
  use_cases?: string[];
  descriptives?: string[];
  featured?: boolean;
  min_notice_period_days?: number;
  include_custom_rates?: boolean;
  include_live_moderated?: boolean;
  reader_app_enabled?: boolean;
  owner_id?: string;
  sort?: string;
  page?: number;
};

export interface AddSharedVoiceInput {
  public_user_id: string;
  voice_id: string;
  new_name: string;
}

export interface WorkspaceMemberUpdateInput {
  email: string;
  is_locked?: boolean;
  workspace_role?: 'workspace_admin' | 'workspace_member';
}

export interface ResourceTarget {
  user_email?: string;
  group_id?: string;
  workspace_api_key_id?: string;
}

export interface ShareResourceInput extends ResourceTarget {
  role: 'admin' | 'editor' | 'viewer';
  resource_type: string;
}

export interface UnshareResourceInput extends ResourceTarget {
  resource_type: string;
}

export interface WorkspaceInviteInput {
  email: string;
  group_ids?: string[];
  workspace_permission?: string;
}

export interface WorkspaceBulkInviteInput {
  emails: string[];
  group_ids?: string[];
}

export interface ServiceAccountApiKeyInput {
  name: string;
  permissions: string[] | 'all';
  character_limit?: number;
  [key: string]: unknown;
}

export interface ServiceAccountApiKeyUpdateInput extends ServiceAccountApiKeyInput {
  is_enabled: boolean;
}

export interface PronunciationFileInput {
  name: string;
  file?: FileData;
  filename?: string;
  description?: string;
  workspace_access?: string;
}

export interface PronunciationRule {
  type: 'alias' | 'phoneme';
  string_to_replace: string;
  alias?: string;
  phoneme?: string;
  alphabet?: string;
}

export interface PronunciationRulesInput {
  name: string;
  rules: PronunciationRule[];
  description?: string;
  workspace_access?: string;
}

export type PronunciationListQuery = CursorQuery & {
  sort?: 'creation_time_unix' | 'name';
  sort_direction?: SortDirection;
};

// ════════════════════════════════════════════════════════════════════════════
// AUDIO
// ════════════════════════════════════════════════════════════════════════════

export interface VoiceSettings {
  stability?: number;
  similarity_boost?: number;
  style?: number;
  use_speaker_boost?: boolean;
  speed?: number;
}

export interface PronunciationDictionaryLocator {
  pronunciation_dictionary_id: string;
  version_id?: string;
}

/**
 * Parametros de query comuns aos endpoints de sintese
 */
export type SpeechQueryOptions = {
  enable_logging?: boolean;
  optimize_streaming_latency?: number;
  output_format?: string;
};

export interface SpeechBodyOptions {
  model_id?: string;
  language_code?: string;
  voice_settings?: VoiceSettings;
  pronunciation_dictionary_locators?: PronunciationDictionaryLocator[];
  seed?: number;
  previous_text?: string;
  next_text?: string;
  previous_request_ids?: string[];
  next_request_ids?: string[];
  apply_text_normalization?: 'auto' | 'on' | 'off';
  apply_language_text_normalization?: boolean;
  use_pvc_as_ivc?: boolean;
}

export type TextToSpeechOptions = SpeechQueryOptions & SpeechBodyOptions;

export interface TimestampAlignment {
  characters: string[];
  character_start_times_seconds: number[];
  character_end_times_seconds: number[];
}

export interface SpeechWithTimestampsChunk {
  audio_base64: string;
  alignment?: TimestampAlignment | null;
  normalized_alignment?: TimestampAlignment | null;
}

export interface DialogueInput {
  text: string;
  voice_id: string;
}

export interface TextToDialogueOptions {
  model_id?: string;
  language_code?: string;
  settings?: JsonObject;
  pronunciation_dictionary_locators?: PronunciationDictionaryLocator[];
  seed?: number;
  apply_text_normalization?: 'auto' | 'on' | 'off';
  output_format?: string;
}

export interface VoiceCreateInput {
  name: string;
  files?: FilePart[];
  description?: string;
  labels?: Record<string, string | number | boolean>;
  remove_background_noise?: boolean;
}

export interface VoiceEditInput {
  name?: string;
  files?: FilePart[];
  description?: string;
  labels?: Record<string, string | number | boolean>;
  remove_background_noise?: boolean;
}

export interface SoundGenerationOptions {
  loop?: boolean;
  duration_seconds?: number;
  prompt_influence?: number;
  output_format?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// UPLOADS DE AUDIO
// ════════════════════════════════════════════════════════════════════════════

/**
 * Arquivo de entrada; o content type vem da extensao de `filename`
 */
export interface FileUpload {
  file: FileData;
  filename: string;
}

// ════════════════════════════════════════════════════════════════════════════
// DUBBING
// ════════════════════════════════════════════════════════════════════════════

export type DubbingMode = 'automatic' | 'manual';

export interface DubbingCreateInput extends FileUpload {
  target_lang: string;
  name?: string;
  source_lang?: string;
  /** Default: 1 */
  num_speakers?: number;
  /** Default: automatic */
  mode?: DubbingMode;
  watermark?: boolean;
  start_time?: number;
  end_time?: number;
  highest_resolution?: boolean;
  drop_background_audio?: boolean;
  use_profanity_filter?: boolean;
  dubbing_studio?: boolean;
  disable_voice_cloning?: boolean;
}

export interface DubbingCreatedResponse {
  dubbing_id: string;
  expected_duration_sec: number;
}

export type DubbingListQuery = CursorQuery & {
  dubbing_status?: 'dubbing' | 'dubbed' | 'failed';
  filter_by_creator?: 'personal' | 'others' | 'all';
};

export interface DubbingSegmentCreateInput {
  start_time: number;
  end_time: number;
  text?: string;
  /** Idioma → texto traduzido */
  translations?: Record<string, string>;
}

export interface DubbingSegmentUpdateInput {
  start_time?: number;
  end_time?: number;
  text?: string;
}

export type DubbingRenderType = 'mp4' | 'aac' | 'mp3' | 'wav' | 'aaf' | 'tracks_zip' | 'clips_zip';

export interface DubbingRenderInput {
  render_type: DubbingRenderType;
  normalize_volume?: boolean;
}

export interface DubbingSpeakerUpdateInput {
  voice_id?: string;
  languages?: string[];
}

export type DubbingTranscriptQuery = {
  format_type?: 'srt' | 'webvtt';
};

// ════════════════════════════════════════════════════════════════════════════
// SPEECH TO TEXT
// ════════════════════════════════════════════════════════════════════════════

export interface SpeechToTextInput {
  model_id: string;
  /** Arquivo local; alternativa a cloud_storage_url */
  file?: FileData;
  filename?: string;
  cloud_storage_url?: string;
  enable_logging?: boolean;
  language_code?: string;
  tag_audio_events?: boolean;
  num_speakers?: number;
  timestamps_granularity?: 'none' | 'word' | 'character';
  diarize?: boolean;
  diarization_threshold?: number;
  additional_formats?: JsonObject[];
  file_format?: 'pcm_s16le_16' | 'other';
  webhook?: boolean;
  webhook_id?: string;
  /** Objetos sao enviados como JSON */
  webhook_metadata?: JsonObject | string;
  temperature?: number;
  seed?: number;
  use_multi_channel?: boolean;
}

// ════════════════════════════════════════════════════════════════════════════
// SPEECH TO SPEECH / AUDIO ISOLATION
// ════════════════════════════════════════════════════════════════════════════

export interface SpeechToSpeechInput extends FileUpload, SpeechQueryOptions {
  model_id?: string;
  voice_settings?: VoiceSettings;
  seed?: number;
  remove_background_noise?: boolean;
  file_format?: 'pcm_s16le_16' | 'other';
}

export interface AudioIsolationInput extends FileUpload {
  file_format?: 'pcm_s16le_16' | 'other';
}

// ════════════════════════════════════════════════════════════════════════════
// MUSIC
// ════════════════════════════════════════════════════════════════════════════

export interface MusicOptions {
  prompt?: string;
  composition_plan?: JsonObject;
  music_length_ms?: number;
  /** Default: music_v1 */
  model_id?: string;
  output_format?: string;
}

export interface MusicPlanInput {
  prompt: string;
  music_length_ms?: number;
  source_composition_plan?: JsonObject;
  /** Default: music_v1 */
  model_id?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// TEXT TO VOICE
// ════════════════════════════════════════════════════════════════════════════

export interface VoiceDesignOptions {
  output_format?: string;
  model_id?: string;
  text?: string;
  auto_generate_text?: boolean;
  loudness?: number;
  seed?: number;
  guidance_scale?: number;
  stream_previews?: boolean;
  remixing_session_id?: string;
  remixing_session_iteration_id?: string;
  quality?: number;
  reference_audio_base64?: string;
  prompt_strength?: number;
}

export interface VoiceFromDesignInput {
  voice_name: string;
  voice_description: string;
  generated_voice_id: string;
  labels?: Record<string, string>;
  played_not_selected_voice_ids?: string[];
}

// ════════════════════════════════════════════════════════════════════════════
// FORCED ALIGNMENT / AUDIO NATIVE
// ════════════════════════════════════════════════════════════════════════════

export interface ForcedAlignmentInput extends FileUpload {
  text: string;
  enabled_spooled_file?: boolean;
}

export interface AudioNativeCreateInput {
  name: string;
  file?: FileData;
  filename?: string;
  image?: string;
  author?: string;
  title?: string;
  small?: boolean;
  text_color?: string;
  background_color?: string;
  sessionization?: number;
  voice_id?: string;
  model_id?: string;
  auto_convert?: boolean;
  apply_text_normalization?: 'auto' | 'on' | 'off' | 'apply_english';
}

export interface AudioNativeContentInput {
  file?: FileData;
  filename?: string;
  auto_convert?: boolean;
  auto_publish?: boolean;
}
