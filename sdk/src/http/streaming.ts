/**
 * ELEVENLABS SDK - Leitura de respostas em streaming
 *
 * Chunks sao entregues na ordem de chegada, um por vez, sem buffer
 * alem do que o proprio fetch mantem.
 */

/**
 * Rejeita quando o sinal dispara, mesmo que a leitura nunca termine
 */
export function untilAborted<T>(pending: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return pending;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void pending.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Itera os chunks brutos do corpo da resposta.
 * Se o consumidor parar antes do fim, o corpo e cancelado.
 */
export async function* readChunks(
  body: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<Uint8Array, void, unknown> {
  const reader = body.getReader();
  let drained = false;
  try {
    while (true) {
      const { done, value } = await untilAborted(reader.read(), signal);
      if (done) {
        drained = true;
        return;
      }
      if (value && value.byteLength > 0) {
        yield value;
      }
    }
  } finally {
    try {
      if (!drained) {
        await reader.cancel(signal?.reason);
      }
    } finally {
      reader.releaseLock();
    }
  }
}

function parseLine<T>(line: string): T | undefined {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed) as T;
  } catch {
    // Linhas malformadas sao descartadas
    return undefined;
  }
}

/**
 * Decodifica JSON delimitado por newline a partir de chunks.
 * Um objeto pode atravessar varios chunks.
 */
export async function* readJsonLines<T>(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<T, void, unknown> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });
    let newlineIndex: number;
    while ((newlineIndex = buffer.indexOf('\n')) !== -1) {
      const parsed = parseLine<T>(buffer.slice(0, newlineIndex));
      buffer = buffer.slice(newlineIndex + 1);
      if (parsed !== undefined) {
        yield parsed;
      }
    }
  }

  buffer += decoder.decode();
  const last = parseLine<T>(buffer);
  if (last !== undefined) {
    yield last;
  }
}
