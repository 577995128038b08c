import { Injectable, Logger } from '@nestjs/common';
import { describeError, DocumentExtractionError } from '../../../common/errors/pipeline.errors';

const PDF_MAGIC = '%PDF-';

/**
 * Turns an uploaded payload into plain text. PDFs go through pdf-parse,
 * `text/*` payloads are decoded as UTF-8; anything else is rejected.
 */
@Injectable()
export class TextExtractionService {
  private readonly logger = new Logger(TextExtractionService.name);

  async extract(payload: Buffer, contentType: string): Promise<string> {
    const mime = contentType.split(';')[0].trim().toLowerCase();

    if (mime === 'application/pdf' || this.looksLikePdf(payload)) {
      return this.extractPdf(payload);
    }
    if (mime.startsWith('text/')) {
      return this.decodeUtf8(payload);
    }

    throw new DocumentExtractionError(`Unsupported content type "${contentType}"`);
  }

  private looksLikePdf(payload: Buffer): boolean {
    return payload.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;
  }

  private decodeUtf8(payload: Buffer): string {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(payload);
    } catch (error) {
      throw new DocumentExtractionError('Document is not valid UTF-8 text', error);
    }
  }

  private async extractPdf(payload: Buffer): Promise<string> {
    // loaded lazily: pdf-parse is heavy and only needed for PDFs
    const { default: pdfParse } = await import('pdf-parse');
    try {
      const result = await pdfParse(payload);
      this.logger.debug(`Extracted ${result.text.length} characters from ${result.numpages} PDF pages`);
      return result.text;
    } catch (error) {
      throw new DocumentExtractionError(`Could not read PDF: ${describeError(error)}`, error);
    }
  }
}
