import { Inject, Injectable } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

export interface TextChunk {
  ordinal: number;
  text: string;
  startPosition: number;
  endPosition: number;
}

// Preferred cut points, strongest first.
const SEPARATORS = ['\n\n', '\n', ' '];

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

/**
 * Splits text into windows of at most `chunkSize` characters. A window is
 * cut at the last paragraph break inside it, else the last line break, else
 * the last space, provided the cut keeps at least a quarter of the window;
 * otherwise the window is cut hard. Consecutive windows share up to
 * `overlap` characters, starting on a word boundary.
 */
export class TextChunker {
  constructor(private readonly options: ChunkingOptions) {
    if (options.overlap >= options.chunkSize) {
      throw new Error('Chunk overlap must be smaller than the chunk size');
    }
  }

  chunk(text: string): TextChunk[] {
    const clean = this.preprocess(text);
    const { chunkSize, overlap } = this.options;
    const minCut = Math.floor(chunkSize / 4);
    const chunks: TextChunk[] = [];

    let start = 0;
    while (start < clean.length) {
      let end = Math.min(start + chunkSize, clean.length);
      if (end < clean.length) {
        end = this.findCut(clean, start, end, minCut);
      }

      const piece = clean.slice(start, end).trim();
      if (piece.length > 0) {
        chunks.push({ ordinal: chunks.length, text: piece, startPosition: start, endPosition: end });
      }
      if (end >= clean.length) {
        break;
      }

      let next = end - overlap;
      if (overlap > 0) {
        while (next < end && next > 0 && !isWhitespace(clean[next - 1])) {
          next++;
        }
      }
      if (next <= start) {
        next = end;
      }
      while (next < clean.length && isWhitespace(clean[next])) {
        next++;
      }
      start = next;
    }

    return chunks;
  }

  private findCut(text: string, start: number, end: number, minCut: number): number {
    for (const separator of SEPARATORS) {
      const index = text.lastIndexOf(separator, end);
      if (index >= start + minCut && index > start) {
        return index;
      }
    }
    return end;
  }

  private preprocess(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}

@Injectable()
export class ChunkingService {
  private readonly chunker: TextChunker;

  constructor(@Inject(PIPELINE_CONFIG) config: PipelineConfig) {
    this.chunker = new TextChunker(config.chunking);
  }

  chunk(text: string): TextChunk[] {
    return this.chunker.chunk(text);
  }
}
