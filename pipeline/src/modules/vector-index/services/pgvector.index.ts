/**
 * pgvector Index
 *
 * Stores chunk embeddings in a PostgreSQL table with a pgvector column and
 * answers similarity queries with the cosine distance operator (<=>).
 *
 * Expected table (managed outside the pipeline):
 *   CREATE TABLE chunk_embeddings (
 *     chunk_id  text PRIMARY KEY,
 *     embedding vector(<dimension>) NOT NULL
 *   );
 *
 * Scores are reported as similarity (1 - cosine distance). Ties are broken
 * by chunk id under the "C" collation so ordering matches code-unit order
 * regardless of the database locale.
 */

import { Logger, OnModuleDestroy } from '@nestjs/common';
import { VectorDimensionError } from '../../../common/errors/pipeline.errors';
import { ScoredChunk, VectorIndex } from '../vector-index.interface';

/** The part of a pg Pool this index uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export class PgVectorIndex implements VectorIndex, OnModuleDestroy {
  private readonly logger = new Logger(PgVectorIndex.name);

  constructor(
    private readonly db: SqlClient,
    private readonly table: string,
    private readonly dimension: number,
  ) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
      throw new Error(`Invalid vector table name "${table}"`);
    }
  }

  async upsert(chunkId: string, vector: number[]): Promise<void> {
    this.validateEmbedding(vector);
    await this.db.query(
      `INSERT INTO ${this.table} (chunk_id, embedding) VALUES ($1, $2::vector)
       ON CONFLICT (chunk_id) DO UPDATE SET embedding = EXCLUDED.embedding`,
      [chunkId, this.formatVectorLiteral(vector)],
    );
  }

  async query(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (k <= 0) {
      return [];
    }
    this.validateEmbedding(vector);

    const startTime = Date.now();
    const { rows } = await this.db.query(
      `SELECT chunk_id, 1 - (embedding <=> $1::vector) AS score
       FROM ${this.table}
       ORDER BY embedding <=> $1::vector ASC, chunk_id COLLATE "C" ASC
       LIMIT $2`,
      [this.formatVectorLiteral(vector), k],
    );

    const results = rows.map((row) => this.mapRow(row));
    this.logger.debug(`Retrieved ${results.length}/${k} chunks in ${Date.now() - startTime}ms`);
    return results;
  }

  async delete(chunkId: string): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM ${this.table} WHERE chunk_id = $1`, [chunkId]);
    return (rowCount ?? 0) > 0;
  }

  async size(): Promise<number> {
    const { rows } = await this.db.query(`SELECT count(*)::int AS count FROM ${this.table}`);
    const [row] = rows;
    if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    throw new Error(`Unexpected count row from ${this.table}`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.end();
  }

  /**
   * pgvector literal: '[0.12,-0.34,...]'
   */
  private formatVectorLiteral(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  private validateEmbedding(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new VectorDimensionError(this.dimension, vector.length);
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new Error('Embedding contains non-finite values (NaN/Infinity)');
    }
  }

  private mapRow(row: unknown): ScoredChunk {
    if (
      typeof row === 'object' && row !== null &&
      'chunk_id' in row && typeof row.chunk_id === 'string' &&
      'score' in row && typeof row.score === 'number'
    ) {
      return { chunkId: row.chunk_id, score: row.score };
    }
    throw new Error(`Unexpected row shape from ${this.table}`);
  }
}
