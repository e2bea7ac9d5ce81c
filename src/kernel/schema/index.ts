export { ProtoParser, compileProtos, PROTO_FILE_GLOB } from './parser.ts';
export { buildSchema, buildRouteSchema, buildFieldKey, buildFieldKeyFrom } from './builder.ts';
export { computeSchemaVersion, stableStringify, FALLBACK_VERSION } from './version.ts';
export { toSchemaDocument, fromSchemaDocument, schemaContent } from './document.ts';
export { canonicalize, normalizeTypeName } from './type-map.ts';
export { classifyLine, parseTag } from './grammar.ts';
export { defaultProtoOptions, hasProtoConfig } from './options.ts';
export { MESSAGES_KEY } from './types.ts';
export type { BuildOptions } from './builder.ts';
export type { LineMatch } from './grammar.ts';
export type { ProtoOptions } from './options.ts';
export type { Canonicalized } from './type-map.ts';
export type {
  FieldModifier,
  FieldTags,
  FieldType,
  MessageField,
  MessageRegistry,
  ProtoField,
  ProtoMessage,
  ProtoSchema,
  RouteMapping,
  RouteSchema,
  ScalarField,
  SchemaDocument,
} from './types.ts';
