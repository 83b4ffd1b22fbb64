/**
 * Datex2Parser - Stateful entry point for the DATEX2 pipeline
 *
 * Keeps the last payload and the last parsed document so callers can run the
 * steps one at a time: fetch or load, parse, then read situations.
 */

import { DgtDatex2Client } from '../../clients/DgtDatex2Client.js';
import { DocumentNotLoadedError, NoContentError } from '../../types/errors.js';
import { Datex2DocumentLoader } from './Datex2DocumentLoader.js';
import type { Datex2Document } from './Datex2DocumentLoader.js';
import { loadDatex2File } from './Datex2FileSource.js';
import { SituationExtractor } from './SituationExtractor.js';
import type { Situation } from './types.js';

export interface Datex2ParserOptions {
  /** Feed URL; ignored when `client` is given */
  url?: string;
  client?: DgtDatex2Client;
  loader?: Datex2DocumentLoader;
  extractor?: SituationExtractor;
}

export class Datex2Parser {
  private readonly options: Datex2ParserOptions;
  private clientInstance?: DgtDatex2Client;
  private readonly loader: Datex2DocumentLoader;
  private readonly extractor: SituationExtractor;

  private content: Buffer | null = null;
  private document: Datex2Document | null = null;

  constructor(options: Datex2ParserOptions = {}) {
    this.options = options;
    this.clientInstance = options.client;
    this.loader = options.loader ?? new Datex2DocumentLoader();
    this.extractor = options.extractor ?? new SituationExtractor();
  }

  /**
   * The HTTP client is created on first use so that offline runs
   * never need a feed configuration.
   */
  private get client(): DgtDatex2Client {
    if (!this.clientInstance) {
      this.clientInstance = new DgtDatex2Client({ url: this.options.url });
    }
    return this.clientInstance;
  }

  /**
   * Download the feed and keep it for {@link parseXml}
   */
  async fetchData(): Promise<Buffer> {
    this.content = await this.client.fetch();
    return this.content;
  }

  /**
   * Read a local file and keep it for {@link parseXml}
   */
  async loadFromFile(filePath: string): Promise<Buffer> {
    this.content = await loadDatex2File(filePath);
    return this.content;
  }

  /**
   * Parse the given content, or the content fetched/loaded earlier
   *
   * @throws NoContentError when there is nothing to parse
   * @throws MalformedDocumentError when the content is not well-formed XML
   */
  async parseXml(content?: Buffer | string): Promise<Datex2Document> {
    const source = content ?? this.content;
    if (source === null) {
      throw new NoContentError();
    }

    // A failed parse must not leave the previous document readable
    this.document = null;
    this.document = await this.loader.parse(source);
    return this.document;
  }

  /**
   * Situations of the last parsed document
   *
   * @throws DocumentNotLoadedError when no document has been parsed
   */
  getSituations(): Situation[] {
    if (!this.document) {
      throw new DocumentNotLoadedError();
    }
    return this.extractor.extract(this.document);
  }
}
