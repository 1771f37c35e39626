/**
 * ELEVENLABS SDK - Formularios multipart
 *
 * Converte MultipartPayload em FormData (fetch nativo do Node 20).
 * Arquivos aceitam Buffer, Uint8Array, ArrayBuffer, Blob ou Readable.
 */

import { extname } from 'path';
import { Readable } from 'stream';
import { buffer as readStream } from 'stream/consumers';

import { FileData, FilePart, MultipartPayload, MultipartValue } from '../types';

const MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
  '.m4a': 'audio/mp4',
  '.ogg': 'audio/ogg',
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.html': 'text/html',
  '.epub': 'application/epub+zip',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.pls': 'application/pls+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp'
};

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/**
 * MIME type pela extensao do arquivo
 */
export function mimeFor(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

/**
 * Atalho para montar FilePart com content type inferido
 */
export function filePart(data: FileData, filename: string, contentType?: string): FilePart {
  return { data, filename, contentType: contentType ?? mimeFor(filename) };
}

export function isFilePart(value: unknown): value is FilePart {
  return typeof value === 'object' && value !== null && 'data' in value && 'filename' in value;
}

async function toBlob(part: FilePart): Promise<Blob> {
  const type = part.contentType ?? mimeFor(part.filename);
  const { data } = part;

  if (data instanceof Blob) {
    return data.type === type ? data : new Blob([data], { type });
  }
  if (data instanceof Readable) {
    return new Blob([await readStream(data)], { type });
  }
  if (data instanceof ArrayBuffer) {
    return new Blob([new Uint8Array(data)], { type });
  }
  return new Blob([data], { type });
}

async function appendValue(form: FormData, name: string, value: MultipartValue): Promise<void> {
  if (isFilePart(value)) {
    form.append(name, await toBlob(value), value.filename);
    return;
  }
  form.append(name, String(value));
}

/**
 * Monta FormData a partir do payload.
 * Valores null/undefined sao omitidos; arrays geram campos repetidos.
 */
export async function buildFormData(payload: MultipartPayload): Promise<FormData> {
  const form = new FormData();

  for (const [name, value] of Object.entries(payload)) {
    if (value === undefined || value === null) {
      continue;
    }
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      await appendValue(form, name, item);
    }
  }

  return form;
}
