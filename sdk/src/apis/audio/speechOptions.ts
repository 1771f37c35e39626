import { compact } from '../../http/body';
import { RequestBody, SpeechQueryOptions, TextToSpeechOptions } from '../../types';

export interface SplitSpeechOptions {
  query: SpeechQueryOptions;
  body: RequestBody;
}

/**
 * Separa opcoes de sintese entre query (formato, latencia, logging)
 * e corpo JSON (modelo, voz, contexto)
 */
export function splitSpeechOptions(text: string, options: TextToSpeechOptions): SplitSpeechOptions {
  const { enable_logging, optimize_streaming_latency, output_format, ...bodyOptions } = options;
  return {
    query: { enable_logging, optimize_streaming_latency, output_format },
    body: compact({ text, ...bodyOptions })
  };
}
