// src/kernel/schema/types.ts

/** Wire spellings understood by the client-side protobuf codec. */
export type FieldType =
  | 'string'
  | 'bool'
  | 'int32'
  | 'uInt32'
  | 'sInt32'
  | 'int64'
  | 'uInt64'
  | 'sInt64'
  | 'float'
  | 'double'
  | 'bytes'
  | 'message';

export type ScalarFieldType = Exclude<FieldType, 'message'>;

// `required` is part of the model but the compiler only emits the other two.
export type FieldModifier = 'required' | 'optional' | 'repeated';

export const MESSAGES_KEY = '__messages__';

interface FieldBase {
  name: string;
  tag: number;
  repeated: boolean;
}

export interface ScalarField extends FieldBase {
  type: ScalarFieldType;
}

export interface MessageField extends FieldBase {
  type: 'message';
  typeName: string;
}

export type ProtoField = ScalarField | MessageField;

export interface ProtoMessage {
  name: string;
  /** Source order, duplicates kept verbatim. */
  fields: ProtoField[];
}

export type MessageRegistry = Map<string, ProtoMessage>;

/** Field key -> tag, in ascending tag order. */
export type FieldTags = Map<string, number>;

export interface RouteSchema {
  fields: FieldTags;
  /** Transitively reachable message definitions; emptied in global-message mode. */
  nested: Map<string, FieldTags>;
}

export interface ProtoSchema {
  version: number;
  server: Map<string, RouteSchema>;
  client: Map<string, RouteSchema>;
  messages?: Map<string, FieldTags>;
}

export type RouteMapping = Record<string, string>;

// JSON shapes sent to clients inside the handshake.
export type FieldTagsDocument = Record<string, number>;

export type RouteSchemaDocument = Record<string, number | Record<string, FieldTagsDocument>>;

export interface SchemaDocument {
  version: number;
  server: Record<string, RouteSchemaDocument>;
  client: Record<string, RouteSchemaDocument>;
  __messages__?: Record<string, FieldTagsDocument>;
}
