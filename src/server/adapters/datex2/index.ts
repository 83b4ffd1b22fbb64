export { DATEX2_NAMESPACES, DATEX2_ELEMENTS } from './namespaces.js';
export type { QualifiedName, Datex2Namespace } from './namespaces.js';
export { Datex2DocumentLoader } from './Datex2DocumentLoader.js';
export type { Datex2Document } from './Datex2DocumentLoader.js';
export { SituationExtractor, extractPointInfo, selectLocationPoint, parseDecimal } from './SituationExtractor.js';
export { Datex2Parser } from './Datex2Parser.js';
export type { Datex2ParserOptions } from './Datex2Parser.js';
export { loadDatex2File } from './Datex2FileSource.js';
export type { Situation, PointInfo, SituationSeverity } from './types.js';
export type { XmlElement, XmlAttribute } from './XmlTree.js';
