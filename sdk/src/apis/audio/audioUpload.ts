import { filePart } from '../../http/multipart';
import { MultipartPayload, SpeechQueryOptions, SpeechToSpeechInput } from '../../types';

export interface SplitSpeechUpload {
  query: SpeechQueryOptions;
  form: MultipartPayload;
}

/**
 * Separa a conversao de voz entre query (formato, latencia, logging)
 * e formulario (audio de origem e ajustes do modelo).
 * voice_settings segue como JSON em um campo texto.
 */
export function splitSpeechUpload(input: SpeechToSpeechInput): SplitSpeechUpload {
  const {
    file,
    filename,
    enable_logging,
    optimize_streaming_latency,
    output_format,
    voice_settings,
    ...fields
  } = input;

  return {
    query: { enable_logging, optimize_streaming_latency, output_format },
    form: {
      ...fields,
      audio: filePart(file, filename),
      voice_settings: voice_settings ? JSON.stringify(voice_settings) : undefined
    }
  };
}
