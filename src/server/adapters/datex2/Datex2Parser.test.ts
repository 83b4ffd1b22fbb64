import { describe, it, expect, vi } from 'vitest';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { AxiosAdapter } from 'axios';
import { DgtDatex2Client } from '../../clients/DgtDatex2Client.js';
import {
  DocumentNotLoadedError,
  DocumentSourceError,
  MalformedDocumentError,
  NoContentError,
} from '../../types/errors.js';
import { Datex2Parser } from './Datex2Parser.js';

const FIXTURE = fileURLToPath(new URL('./__fixtures__/situation-publication.xml', import.meta.url));

function stubClient(payload: Buffer): DgtDatex2Client {
  const adapter: AxiosAdapter = async config => ({
    data: payload,
    status: 200,
    statusText: 'OK',
    headers: {},
    config,
  });
  return new DgtDatex2Client({ url: 'https://feed.test/datex2.xml', http: { adapter } });
}

describe('Datex2Parser', () => {
  it('refuses to return situations before a document is parsed', () => {
    const parser = new Datex2Parser();
    expect(() => parser.getSituations()).toThrow(DocumentNotLoadedError);
    expect(() => parser.getSituations()).toThrow('XML not parsed. Call parseXml() first.');
  });

  it('refuses to parse when nothing was fetched or loaded', async () => {
    const parser = new Datex2Parser();
    await expect(parser.parseXml()).rejects.toThrow(NoContentError);
  });

  it('parses content passed directly', async () => {
    const parser = new Datex2Parser();
    const xml = await readFile(FIXTURE, 'utf-8');

    await parser.parseXml(xml);

    expect(parser.getSituations().map(situation => situation.id)).toEqual(['S-0001', 'S-0002', 'S-0003']);
  });

  it('loads, parses and extracts a local file', async () => {
    const parser = new Datex2Parser();

    const content = await parser.loadFromFile(FIXTURE);
    const document = await parser.parseXml();

    expect(document.byteLength).toBe(content.length);
    expect(parser.getSituations()).toHaveLength(3);
  });

  it('reports a missing local file', async () => {
    const parser = new Datex2Parser();
    const missing = fileURLToPath(new URL('./__fixtures__/missing.xml', import.meta.url));

    await expect(parser.loadFromFile(missing)).rejects.toThrow(DocumentSourceError);
    await expect(parser.loadFromFile(missing)).rejects.toThrow(
      `Could not read DATEX2 document from ${missing}: file not found`
    );
  });

  it('forgets the previous document when a parse fails', async () => {
    const parser = new Datex2Parser();
    await parser.loadFromFile(FIXTURE);
    await parser.parseXml();
    expect(parser.getSituations()).toHaveLength(3);

    await expect(parser.parseXml('<root><open></root>')).rejects.toThrow(MalformedDocumentError);
    expect(() => parser.getSituations()).toThrow(DocumentNotLoadedError);
  });

  it('fetches the feed through the client', async () => {
    const payload = await readFile(FIXTURE);
    const client = stubClient(payload);
    const fetchSpy = vi.spyOn(client, 'fetch');
    const parser = new Datex2Parser({ client });

    const fetched = await parser.fetchData();
    await parser.parseXml();

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetched.equals(payload)).toBe(true);
    expect(parser.getSituations().map(situation => situation.roadName)).toEqual(['A-1', 'AP-7', 'N-634']);
  });

  it('keeps situations stable across repeated calls', async () => {
    const parser = new Datex2Parser();
    await parser.loadFromFile(FIXTURE);
    await parser.parseXml();

    expect(parser.getSituations()).toEqual(parser.getSituations());
  });
});
