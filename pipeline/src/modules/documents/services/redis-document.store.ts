/**
 * Redis Document Store
 *
 * Keeps each document as a hash (`<prefix>:document:<id>`), its raw bytes
 * under `<prefix>:document:<id>:payload` and its chunks as a hash of
 * ordinal -> JSON under `<prefix>:document:<id>:chunks`.
 *
 * Creation and state changes run as Lua scripts so the existence check,
 * the transition check and the write happen in one atomic step on the
 * server: two workers racing on the same id cannot both win a transition.
 * The payload is written before the record, so no reader sees a record
 * without its payload.
 */

import { Logger } from '@nestjs/common';
import Redis from 'ioredis';
import {
  describeError,
  InvalidTransitionError,
  NotFoundError,
} from '../../../common/errors/pipeline.errors';
import { documentIdFor } from '../document-id';
import { DocumentStore } from '../document-store.interface';
import {
  allowedSources,
  ChunkRecord,
  CreateDocumentOptions,
  DocumentRecord,
  DocumentState,
  documentIdOfChunk,
  isDocumentState,
  StateDetail,
} from '../document.types';

// KEYS[1] = document hash; ARGV = hash field/value pairs
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
for i = 1, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
return 1
`;

const RECORD_FIELDS = [
  'id',
  'payloadRef',
  'contentType',
  'fileName',
  'state',
  'chunkCount',
  'attempts',
  'createdAt',
  'updatedAt',
  'error',
] as const;

// KEYS[1] = document hash
// ARGV[1] = target state, ARGV[2] = updatedAt, ARGV[3] = error, ARGV[4] = chunk count ('' keeps it),
// ARGV[5..] = states the document may currently be in
// replies {'ok', <RECORD_FIELDS values, '' when unset>}
const SET_STATE_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'state')
if not current then
  return {'missing'}
end
local allowed = false
for i = 5, #ARGV do
  if ARGV[i] == current then
    allowed = true
  end
end
if not allowed then
  return {'invalid', current}
end
redis.call('HSET', KEYS[1], 'state', ARGV[1], 'updatedAt', ARGV[2])
if ARGV[1] == 'processing' then
  redis.call('HINCRBY', KEYS[1], 'attempts', 1)
end
if ARGV[1] == 'failed' then
  if ARGV[3] ~= '' then
    redis.call('HSET', KEYS[1], 'error', ARGV[3])
  end
else
  redis.call('HDEL', KEYS[1], 'error')
end
if ARGV[4] ~= '' then
  redis.call('HSET', KEYS[1], 'chunkCount', ARGV[4])
end
local values = redis.call('HMGET', KEYS[1], ${RECORD_FIELDS.map((field) => `'${field}'`).join(', ')})
local reply = {'ok'}
for i = 1, ${RECORD_FIELDS.length} do
  reply[i + 1] = values[i] or ''
end
return reply
`;

export class RedisDocumentStore implements DocumentStore {
  private readonly logger = new Logger(RedisDocumentStore.name);

  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(payload: Buffer, options: CreateDocumentOptions): Promise<string> {
    const id = documentIdFor(payload);
    const timestamp = this.now().toISOString();
    const fields: string[] = [
      'id', id,
      'payloadRef', this.payloadKey(id),
      'contentType', options.contentType,
      'state', DocumentState.Pending,
      'chunkCount', '0',
      'attempts', '0',
      'createdAt', timestamp,
      'updatedAt', timestamp,
    ];
    if (options.fileName) {
      fields.push('fileName', options.fileName);
    }

    // same id, same bytes: the payload goes first so no record is seen without it
    await this.redis.set(this.payloadKey(id), payload);
    const created = await this.redis.eval(CREATE_SCRIPT, 1, this.documentKey(id), ...fields);
    if (created === 0) {
      this.logger.debug(`Document ${id} already stored, reusing it`);
    } else {
      this.logger.log(`Stored document ${id} (${payload.length} bytes)`);
    }
    return id;
  }

  async get(id: string): Promise<DocumentRecord> {
    const hash = await this.redis.hgetall(this.documentKey(id));
    if (Object.keys(hash).length === 0) {
      throw new NotFoundError('Document', id);
    }
    return this.parseRecord(id, hash);
  }

  async setState(id: string, state: DocumentState, detail: StateDetail = {}): Promise<DocumentRecord> {
    const reply = await this.redis.eval(
      SET_STATE_SCRIPT,
      1,
      this.documentKey(id),
      state,
      this.now().toISOString(),
      detail.error ?? '',
      detail.chunkCount === undefined ? '' : String(detail.chunkCount),
      ...allowedSources(state),
    );

    if (!Array.isArray(reply) || !reply.every((item): item is string => typeof item === 'string')) {
      throw new Error(`Unexpected reply from state transition script for document ${id}`);
    }
    const [status, ...rest] = reply;
    if (status === 'missing') {
      throw new NotFoundError('Document', id);
    }
    if (status === 'invalid') {
      this.logger.warn(`Rejected transition of ${id} from ${rest[0] ?? 'unknown'} to ${state}`);
      throw new InvalidTransitionError(id, rest[0] ?? 'unknown', state);
    }

    const hash: Record<string, string> = {};
    RECORD_FIELDS.forEach((field, index) => {
      hash[field] = rest[index] ?? '';
    });
    return this.parseRecord(id, hash);
  }

  async getPayload(id: string): Promise<Buffer> {
    const payload = await this.redis.getBuffer(this.payloadKey(id));
    if (!payload) {
      throw new NotFoundError('Document payload', id);
    }
    return payload;
  }

  async putChunks(documentId: string, chunks: ChunkRecord[]): Promise<void> {
    if (chunks.length === 0) return;
    const entries: Record<string, string> = {};
    for (const chunk of chunks) {
      entries[String(chunk.ordinal)] = JSON.stringify(chunk);
    }
    await this.redis.hset(this.chunksKey(documentId), entries);
  }

  async getChunks(ids: string[]): Promise<ChunkRecord[]> {
    const byDocument = new Map<string, string[]>();
    for (const id of ids) {
      const documentId = documentIdOfChunk(id);
      byDocument.set(documentId, [...(byDocument.get(documentId) ?? []), id]);
    }

    const found = new Map<string, ChunkRecord>();
    for (const [documentId, chunkIds] of byDocument) {
      const ordinals = chunkIds.map((id) => id.slice(documentId.length + 1));
      const values = await this.redis.hmget(this.chunksKey(documentId), ...ordinals);
      for (const value of values) {
        const chunk = value === null ? undefined : this.parseChunk(value);
        if (chunk) {
          found.set(chunk.id, chunk);
        }
      }
    }

    // keep caller order
    return ids.flatMap((id) => {
      const chunk = found.get(id);
      return chunk ? [chunk] : [];
    });
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    await this.get(documentId);
    const values = await this.redis.hvals(this.chunksKey(documentId));
    return values
      .flatMap((value) => {
        const chunk = this.parseChunk(value);
        return chunk ? [chunk] : [];
      })
      .sort((a, b) => a.ordinal - b.ordinal);
  }

  async delete(id: string): Promise<string[]> {
    const chunks = await this.listChunks(id);
    await this.redis.del(this.documentKey(id), this.payloadKey(id), this.chunksKey(id));
    this.logger.log(`Deleted document ${id} with ${chunks.length} chunks`);
    return chunks.map((chunk) => chunk.id);
  }

  private parseRecord(id: string, hash: Record<string, string>): DocumentRecord {
    const state = hash.state;
    if (!isDocumentState(state)) {
      throw new Error(`Document ${id} has an unknown state "${state}"`);
    }
    return {
      id,
      payloadRef: hash.payloadRef ?? this.payloadKey(id),
      contentType: hash.contentType ?? 'application/octet-stream',
      fileName: hash.fileName || undefined,
      state,
      chunkCount: Number(hash.chunkCount ?? 0),
      attempts: Number(hash.attempts ?? 0),
      createdAt: hash.createdAt ?? '',
      updatedAt: hash.updatedAt ?? '',
      error: hash.error || undefined,
    };
  }

  private parseChunk(raw: string): ChunkRecord | undefined {
    try {
      const value: unknown = JSON.parse(raw);
      if (
        typeof value === 'object' && value !== null &&
        'id' in value && typeof value.id === 'string' &&
        'documentId' in value && typeof value.documentId === 'string' &&
        'ordinal' in value && typeof value.ordinal === 'number' &&
        'text' in value && typeof value.text === 'string'
      ) {
        return { id: value.id, documentId: value.documentId, ordinal: value.ordinal, text: value.text };
      }
    } catch (error) {
      this.logger.warn(`Skipping unreadable chunk entry: ${describeError(error)}`);
      return undefined;
    }
    this.logger.warn('Skipping chunk entry with an unexpected shape');
    return undefined;
  }

  private documentKey(id: string): string {
    return `${this.prefix}:document:${id}`;
  }

  private payloadKey(id: string): string {
    return `${this.prefix}:document:${id}:payload`;
  }

  private chunksKey(id: string): string {
    return `${this.prefix}:document:${id}:chunks`;
  }
}
