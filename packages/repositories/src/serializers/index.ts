export { SerializerFactory, createSerializerFactory, defaultSerializerFactory } from './factory.js';
export type { SerializerFactoryOptions } from './factory.js';
export { JsonSerializer, parseJsonText } from './json.js';
export { CsvSerializer, coerceCell, formatCell, splitArrayCell } from './csv.js';
export type { CsvSerializerOptions } from './csv.js';
export { NdjsonSerializer } from './ndjson.js';
export { YamlSerializer } from './yaml.js';
export { buildTable, validateRecord, describeIssues, unwrapSchema } from './records.js';
export type { RawRecord } from './records.js';
export { TableAnnotations, ANNOTATION_PREFIX, isAnnotationColumn } from './annotations.js';
export type { AnnotationColumn } from './annotations.js';
