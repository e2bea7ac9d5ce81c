// src/kernel/schema/parser.ts
import * as fs from 'fs';
import * as path from 'path';
import picomatch from 'picomatch';
import { SILENT_LOGGER } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';
import { buildSchema } from './builder.ts';
import { braceDelta, classifyLine } from './grammar.ts';
import { hasProtoConfig } from './options.ts';
import type { ProtoOptions } from './options.ts';
import { canonicalize, normalizeTypeName } from './type-map.ts';
import type { MessageRegistry, ProtoField, ProtoMessage, ProtoSchema } from './types.ts';

export const PROTO_FILE_GLOB = '**/*.proto';

export class ProtoParser {
  private readonly options: ProtoOptions;
  private readonly logger: LogSink;
  private readonly messages: MessageRegistry = new Map();
  private readonly isProtoFile = picomatch(PROTO_FILE_GLOB, { dot: true });

  constructor(options: ProtoOptions, logger: LogSink = SILENT_LOGGER) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Parses every configured source and builds the schema. Returns undefined
   * when nothing is configured or no source file exists. Throws only when the
   * scan directory itself cannot be walked.
   */
  parse(): ProtoSchema | undefined {
    if (!hasProtoConfig(this.options)) return undefined;

    const files = this.collectFiles();
    if (files.length === 0) {
      this.logger.log({
        level: 'warn',
        action: 'proto.no_files',
        detail: { dir: this.options.dir, files: this.options.files },
      });
      return undefined;
    }

    for (const file of files) {
      this.parseFile(file);
    }

    return buildSchema(this.messages, this.options, this.logger);
  }

  /** Parses one file into the registry; unreadable files are logged and skipped. */
  parseFile(filePath: string): boolean {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (err: unknown) {
      this.logger.log({
        level: 'warn',
        action: 'proto.file_failed',
        detail: { file: filePath, error: err instanceof Error ? err.message : String(err) },
      });
      return false;
    }
    this.parseSource(content, filePath);
    return true;
  }

  parseSource(source: string, origin = '<inline>'): void {
    let current: ProtoMessage | undefined;
    let depth = 0;
    // Header without `{`: depth already counts the brace expected on a later line.
    let pendingOpen = false;

    for (const line of source.split(/\r?\n/)) {
      const match = classifyLine(line);
      if (match.kind === 'blank' || match.kind === 'comment') continue;

      if (match.kind === 'message-header') {
        current = { name: match.name, fields: [] };
        depth = braceDelta(line);
        pendingOpen = depth === 0;
        if (pendingOpen) depth = 1;
        continue;
      }

      if (!current) continue;

      let delta = braceDelta(line);
      if (pendingOpen && line.includes('{')) {
        delta -= 1;
        pendingOpen = false;
      }
      depth += delta;

      if (match.kind === 'map-field') {
        current.fields.push(this.desugarMap(current.name, match));
      } else if (match.kind === 'field') {
        current.fields.push(toField(match));
      }

      if (depth <= 0) {
        this.messages.set(current.name, current);
        this.logger.log({
          level: 'debug',
          action: 'proto.message_parsed',
          detail: { origin, message: current.name, fields: current.fields.length },
        });
        current = undefined;
      }
    }
  }

  getMessages(): MessageRegistry {
    return this.messages;
  }

  private desugarMap(
    owner: string,
    match: { keyType: string; valueType: string; name: string; tag: number },
  ): ProtoField {
    const entryName = `${owner}_${match.name}Entry`;

    const keyType = canonicalize(normalizeTypeName(match.keyType));
    let key: ProtoField;
    if (keyType.found) {
      key = { name: 'key', tag: 1, repeated: false, type: keyType.type };
    } else {
      this.logger.log({
        level: 'warn',
        action: 'proto.map_key_degraded',
        detail: { key_type: match.keyType, field: `${owner}.${match.name}` },
      });
      key = { name: 'key', tag: 1, repeated: false, type: 'string' };
    }

    const valueName = normalizeTypeName(match.valueType);
    const valueType = canonicalize(valueName);
    const value: ProtoField = valueType.found
      ? { name: 'value', tag: 2, repeated: false, type: valueType.type }
      : { name: 'value', tag: 2, repeated: false, type: 'message', typeName: valueName };

    if (!this.messages.has(entryName)) {
      this.messages.set(entryName, { name: entryName, fields: [key, value] });
    }

    return {
      name: match.name,
      tag: match.tag,
      repeated: true,
      type: 'message',
      typeName: entryName,
    };
  }

  private collectFiles(): string[] {
    const files = [...this.options.files];
    if (this.options.dir !== '') {
      this.walk(this.options.dir, this.options.dir, files);
    }
    return files;
  }

  private walk(root: string, dir: string, out: string[]): void {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        this.walk(root, full, out);
        continue;
      }
      const relative = path.relative(root, full).split(path.sep).join('/');
      if (this.isProtoFile(relative)) out.push(full);
    }
  }
}

function toField(match: { repeated: boolean; type: string; name: string; tag: number }): ProtoField {
  const scalar = canonicalize(match.type);
  if (scalar.found) {
    return { name: match.name, tag: match.tag, repeated: match.repeated, type: scalar.type };
  }
  return {
    name: match.name,
    tag: match.tag,
    repeated: match.repeated,
    type: 'message',
    typeName: normalizeTypeName(match.type),
  };
}

export function compileProtos(options: ProtoOptions, logger: LogSink = SILENT_LOGGER): ProtoSchema | undefined {
  return new ProtoParser(options, logger).parse();
}
