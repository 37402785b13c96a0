/**
 * Text extraction module
 * Turns a source file into raw text. Extraction failures never propagate:
 * a failed page (or, for the Docling service, a failed document) contributes
 * empty text and is logged.
 */

import * as fs from 'fs';
import * as path from 'path';
import axios from 'axios';
import FormData from 'form-data';
import * as pdfjsLib from 'pdfjs-dist';
import { logger } from './logger';

type PdfDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;

export interface TextExtractor {
  extract(filePath: string): Promise<string>;
}

/**
 * Page-by-page PDF extraction with pdfjs-dist
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(filePath: string): Promise<string> {
    const fileName = path.basename(filePath);
    logger.info(`Opening PDF for extraction: ${filePath}`);

    let pdfDocument: PdfDocument;
    try {
      const data = new Uint8Array(await fs.promises.readFile(filePath));
      pdfDocument = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
    } catch (error) {
      logger.error(`Could not open ${fileName}; treating it as empty`, error);
      return '';
    }

    const pageTexts: string[] = [];
    try {
      for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
        pageTexts.push(await this.extractPage(pdfDocument, pageNum, fileName));
      }
    } finally {
      await pdfDocument.destroy();
    }

    const joinedText = pageTexts.join('\n');
    logger.info(`Extracted ${joinedText.length} characters from ${fileName}`);
    return joinedText;
  }

  private async extractPage(
    pdfDocument: PdfDocument,
    pageNum: number,
    fileName: string
  ): Promise<string> {
    try {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      return textContent.items
        .flatMap(item => ('str' in item ? [item.str] : []))
        .join(' ');
    } catch (error) {
      logger.error(`Error extracting text from page ${pageNum} of ${fileName}`, error);
      return '';
    }
  }
}

interface DoclingResponse {
  status: string;
  filename: string;
  content: string;
  metadata?: {
    num_pages: number | null;
  };
}

/**
 * Extraction through a Docling conversion service; returns its markdown
 */
export class DoclingTextExtractor implements TextExtractor {
  constructor(private readonly apiUrl: string) {}

  async extract(filePath: string): Promise<string> {
    const fileName = path.basename(filePath);
    logger.info(`Converting ${fileName} via Docling at ${this.apiUrl}`);

    try {
      const form = new FormData();
      form.append('file', await fs.promises.readFile(filePath), { filename: fileName });

      const response = await axios.post<DoclingResponse>(
        `${this.apiUrl}/process-pdf/`,
        form,
        {
          headers: {
            ...form.getHeaders()
          },
          maxContentLength: Infinity,
          maxBodyLength: Infinity
        }
      );

      const content = typeof response.data.content === 'string' ? response.data.content : '';
      logger.info(`Extracted ${content.length} characters from ${fileName}`);
      if (response.data.metadata?.num_pages) {
        logger.debug(`Pages: ${response.data.metadata.num_pages}`);
      }
      return content;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error(`Docling API error for ${fileName}; treating it as empty`, error.response?.data || error.message);
      } else {
        logger.error(`Unexpected error converting ${fileName}; treating it as empty`, error);
      }
      return '';
    }
  }
}
