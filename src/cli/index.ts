#!/usr/bin/env -S node --import tsx
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadServerConfig } from '../kernel/config/yaml-loader.ts';
import type { ServerConfig } from '../kernel/config/yaml-loader.ts';
import { ConsoleLogger } from '../kernel/log/logger.ts';
import type { LogSink } from '../kernel/log/logger.ts';
import { toSchemaDocument } from '../kernel/schema/document.ts';
import { compileProtos } from '../kernel/schema/parser.ts';
import { SessionCommand } from '../kernel/session/command.ts';
import type { SessionCommandOptions } from '../kernel/session/command.ts';

export const DEFAULT_CONFIG = process.env.GATEHOUSE_CONFIG || path.join(process.cwd(), 'gatehouse.yaml');

export type CommandSpec =
  | { command: 'compile'; out?: string }
  | { command: 'handshake'; protoVersion: number }
  | { command: 'help' };

export function printHelp(): void {
  console.log(`gatehouse: proto schema compiler and handshake inspector

Usage:
  gatehouse [--config <path>] compile [--out <file>]
  gatehouse [--config <path>] handshake [--proto-version <n>]

compile     Compile the configured .proto sources and print (or write) the
            schema document sent to clients.
handshake   Report which handshake frame a client declaring <n> receives,
            and the size of both frames.
`);
}

export function parseGlobalArgs(argv: string[]): { configPath: string; args: string[] } {
  const args: string[] = [];
  let configPath = DEFAULT_CONFIG;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (typeof arg !== 'string') continue;
    if (arg === '--config') {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        throw new Error('--config requires a path value');
      }
      configPath = value;
      i += 1;
      continue;
    }
    args.push(arg);
  }
  return { configPath, args };
}

function parseCompileFlags(flags: string[]): CommandSpec {
  const spec: { command: 'compile'; out?: string } = { command: 'compile' };
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    if (flag === '--out') {
      const value = flags[i + 1];
      if (!value || value.startsWith('-')) throw new Error('compile --out requires a file path');
      spec.out = value;
      i += 1;
      continue;
    }
    throw new Error(`Unknown compile flag: ${flag}`);
  }
  return spec;
}

function parseHandshakeFlags(flags: string[]): CommandSpec {
  let protoVersion = 0;
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    if (flag === '--proto-version') {
      const value = flags[i + 1];
      if (value === undefined) throw new Error('handshake --proto-version requires a value');
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error('handshake --proto-version must be a non-negative integer');
      }
      protoVersion = parsed;
      i += 1;
      continue;
    }
    throw new Error(`Unknown handshake flag: ${flag}`);
  }
  return { command: 'handshake', protoVersion };
}

export function parseCommand(args: string[]): CommandSpec {
  const command = args[0];
  switch (command) {
    case 'compile':
      return parseCompileFlags(args.slice(1));
    case 'handshake':
      return parseHandshakeFlags(args.slice(1));
    case '--help':
    case '-h':
    case 'help':
    case undefined:
      return { command: 'help' };
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

/** Runs one command against a loaded config and returns what would be printed. */
export function execute(spec: CommandSpec, config: ServerConfig, logger: LogSink): string {
  switch (spec.command) {
    case 'compile': {
      if (!config.proto) throw new Error('config has no proto section');
      const schema = compileProtos(config.proto, logger);
      if (!schema) throw new Error('no proto files found');
      const json = JSON.stringify(toSchemaDocument(schema), null, 2);
      if (spec.out) {
        fs.writeFileSync(spec.out, `${json}\n`, 'utf8');
        return `wrote schema version ${schema.version} to ${spec.out}`;
      }
      return json;
    }
    case 'handshake': {
      const options: SessionCommandOptions = {
        serializer: config.serializer,
        heartbeatSeconds: config.heartbeat,
        logger,
      };
      if (config.proto) options.proto = config.proto;
      const command = new SessionCommand(options);
      const { lean } = command.negotiate(spec.protoVersion);
      return JSON.stringify(
        {
          server_version: command.getProtoVersion(),
          client_version: spec.protoVersion,
          sent: lean ? 'lean' : 'full',
          full_bytes: command.handshakeBytes(false).length,
          lean_bytes: command.handshakeBytes(true).length,
        },
        null,
        2,
      );
    }
    case 'help':
      return '';
  }
}

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { configPath, args } = parseGlobalArgs(argv);
  const spec = parseCommand(args);
  if (spec.command === 'help') {
    printHelp();
    return;
  }
  const config = loadServerConfig(configPath);
  // Command output owns stdout; only warnings and errors reach stderr.
  const logger = new ConsoleLogger({ level: config.logLevel === 'error' ? 'error' : 'warn' });
  console.log(execute(spec, config, logger));
}

function isDirectRun(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  return import.meta.url === pathToFileURL(argv1).href;
}

if (isDirectRun()) {
  runCli().catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exit(1);
  });
}
