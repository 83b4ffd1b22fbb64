/**
 * Datex2DocumentLoader - parse raw DATEX2 XML into a namespace-aware tree
 *
 * The whole payload is first checked for well-formedness with fast-xml-parser,
 * then parsed with xml2js in namespace mode. The resulting loosely-typed
 * object is validated with zod before being converted into an immutable
 * {@link XmlElement} tree. Schema conformance is not checked: any well-formed
 * XML document loads.
 */

import { TextDecoder } from 'util';
import { XMLValidator } from 'fast-xml-parser';
import { Parser } from 'xml2js';
import { z } from 'zod';
import { MalformedDocumentError, NoContentError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { XmlAttribute, XmlElement } from './XmlTree.js';

const logger = createChildLogger({ component: 'Datex2DocumentLoader' });

/**
 * A parsed DATEX2 document. Only the loader creates these.
 */
export interface Datex2Document {
  readonly root: XmlElement;
  /** Size of the source payload in bytes */
  readonly byteLength: number;
}

/**
 * Node shape produced by xml2js with `xmlns`, `explicitChildren`,
 * `preserveChildrenOrder` and `charsAsChildren` enabled
 */
interface RawXmlNode {
  $ns: { uri: string; local: string };
  $?: Record<string, RawXmlAttribute>;
  $$?: RawXmlChild[];
}

interface RawXmlText {
  '#name': '__text__';
  _: string;
}

type RawXmlChild = RawXmlNode | RawXmlText;

const rawXmlAttributeSchema = z.object({
  name: z.string(),
  value: z.string(),
  local: z.string(),
  uri: z.string(),
});

type RawXmlAttribute = z.infer<typeof rawXmlAttributeSchema>;

const rawXmlTextSchema: z.ZodType<RawXmlText> = z.object({
  '#name': z.literal('__text__'),
  _: z.string(),
});

const rawXmlNodeSchema: z.ZodType<RawXmlNode> = z.lazy(() =>
  z.object({
    $ns: z.object({ uri: z.string(), local: z.string() }),
    $: z.record(z.string(), rawXmlAttributeSchema).optional(),
    $$: z.array(z.union([rawXmlTextSchema, rawXmlNodeSchema])).optional(),
  })
);

const XML2JS_OPTIONS = {
  xmlns: true,
  explicitRoot: false,
  explicitChildren: true,
  preserveChildrenOrder: true,
  charsAsChildren: true,
  includeWhiteChars: true,
  strict: true,
} as const;

const ELEMENT_START_PATTERN = /<[A-Za-z_]/;
const DECLARED_ENCODING_PATTERN = /^(?:\uFEFF|\u00EF\u00BB\u00BF)?<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

function isRawXmlText(child: RawXmlChild): child is RawXmlText {
  return '#name' in child;
}

/**
 * Element text is the run of character data before the first child element,
 * or undefined when there is none.
 */
function leadingText(children: readonly RawXmlChild[]): string | undefined {
  let text: string | undefined;
  for (const child of children) {
    if (!isRawXmlText(child)) {
      break;
    }
    text = (text ?? '') + child._;
  }
  return text;
}

function toXmlElement(node: RawXmlNode): XmlElement {
  const attributes: XmlAttribute[] = Object.values(node.$ ?? {}).map(attribute => ({
    name: attribute.name,
    localName: attribute.local,
    namespaceUri: attribute.uri,
    value: attribute.value,
  }));
  const children = node.$$ ?? [];

  return {
    namespaceUri: node.$ns.uri,
    localName: node.$ns.local,
    attributes,
    text: leadingText(children),
    children: children
      .filter((child): child is RawXmlNode => !isRawXmlText(child))
      .map(toXmlElement),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode a payload with the encoding named in its XML declaration, UTF-8
 * when it names none.
 */
function decodePayload(content: Buffer): string {
  const prolog = content.subarray(0, 256).toString('latin1');
  const encoding = DECLARED_ENCODING_PATTERN.exec(prolog)?.[1] ?? 'utf-8';

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    throw new MalformedDocumentError(`unsupported encoding "${encoding}"`, {
      byteLength: content.length,
    });
  }

  try {
    return decoder.decode(content);
  } catch {
    throw new MalformedDocumentError(`content is not valid ${encoding}`, {
      byteLength: content.length,
    });
  }
}

/**
 * Run xml2js over the whole input. The root is reported as soon as it closes,
 * but sax keeps reading to the end, so errors in trailing content still fail.
 */
function parseRawTree(xmlString: string): unknown {
  const parser = new Parser(XML2JS_OPTIONS);
  let root: unknown;
  let failure: unknown;

  // xml2js reports every top-level element that closes
  parser.on('end', (result: unknown) => {
    if (root === undefined) {
      root = result;
    } else if (failure === undefined) {
      failure = new Error('document has more than one root element');
    }
  });
  parser.on('error', (error: unknown) => {
    if (failure === undefined) {
      failure = error;
    }
  });

  parser.parseString(xmlString);

  if (failure !== undefined) {
    throw failure;
  }
  return root;
}

export class Datex2DocumentLoader {
  /**
   * Parse a complete DATEX2 payload.
   *
   * @throws NoContentError when the content is missing or blank
   * @throws MalformedDocumentError when the content is not well-formed XML
   */
  async parse(content: Buffer | string | null | undefined): Promise<Datex2Document> {
    if (content === null || content === undefined) {
      throw new NoContentError();
    }

    const xmlString = typeof content === 'string' ? content : decodePayload(content);
    if (xmlString.trim().length === 0) {
      throw new NoContentError('XML content is empty.');
    }

    const byteLength = typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;

    if (!ELEMENT_START_PATTERN.test(xmlString)) {
      throw new MalformedDocumentError('document has no root element', { byteLength });
    }

    const validation = XMLValidator.validate(xmlString);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      logger.error({ error: msg, line, col, byteLength }, 'DATEX2 XML is not well-formed');
      throw new MalformedDocumentError(`${msg} (line ${line}, column ${col})`, { byteLength });
    }

    let parsed: unknown;
    try {
      parsed = parseRawTree(xmlString);
    } catch (error) {
      logger.error({ error: errorMessage(error), byteLength }, 'Failed to parse DATEX2 XML');
      throw new MalformedDocumentError(errorMessage(error).split('\n')[0], { byteLength });
    }

    const result = rawXmlNodeSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedDocumentError('document has no root element', { byteLength });
    }

    const root = toXmlElement(result.data);

    logger.debug(
      { byteLength, rootElement: root.localName, rootNamespace: root.namespaceUri },
      'Parsed DATEX2 document'
    );

    return { root, byteLength };
  }
}
