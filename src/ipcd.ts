#!/usr/bin/env node

/**
 * ipcd - session-oriented IPC server over Unix domain sockets or TCP.
 *
 * CLI entrypoint: `serve` runs a server until SIGINT/SIGTERM, `send` and
 * `ping` talk to a running one.
 */

import { getConfig, parseModeName } from './config.ts';
import { CommandCode } from './ipc/command.ts';
import { describeEndpoint, ping, sendPayload, type Endpoint } from './ipc/client.ts';
import { ListenerSetupError } from './ipc/errors.ts';
import { IPCServer } from './ipc/server.ts';
import { TcpTransport } from './ipc/transports/tcp.ts';
import type { TransportAdapter } from './ipc/transports/types.ts';
import { UnixSocketTransport } from './ipc/transports/unix.ts';
import { setDebug } from './utils/logger.ts';

/**
 * Flags shared by all commands.
 */
interface GlobalOptions {
  help?: boolean;
  debug?: boolean;
  quiet?: boolean;
  socket?: string;
  host?: string;
  port?: number;
  timeoutMs?: number;
}

interface ServeOptions extends GlobalOptions {
  mode?: string;
  readLimit?: number;
  chunkSize?: number;
  maxConnections?: number;
  closeDelayMs?: number;
  echo?: boolean;
}

interface SendCommandOptions extends GlobalOptions {
  message?: string;
  stream?: boolean;
}

type ParsedArgs =
  | { command: 'serve'; options: ServeOptions }
  | { command: 'send'; options: SendCommandOptions }
  | { command: 'ping'; options: GlobalOptions }
  | { command: 'help'; options: GlobalOptions };

function parseIntFlag(name: string, raw: string | undefined, min = 0): number {
  const n = raw === undefined ? Number.NaN : Number.parseInt(raw.trim(), 10);
  if (!Number.isFinite(n) || n < min) {
    throw new Error(
      `--${name} expects ${min > 0 ? 'a positive' : 'a non-negative'} integer, got '${raw ?? ''}'`,
    );
  }
  return n;
}

/**
 * Parse CLI argv into a command and its options. Accepts `--flag value` and
 * `--flag=value`.
 *
 * @param argv Full process argv array.
 */
function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2); // Remove node and script name
  const command: string | undefined = args[0];
  const options: ServeOptions & SendCommandOptions = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-')) {
      throw new Error(`Unexpected argument '${arg}'`);
    }
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const takeValue = (): string | undefined => {
      if (eq !== -1) return arg.slice(eq + 1);
      i++;
      return args[i];
    };

    switch (flag) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      case '--echo':
        options.echo = true;
        break;
      case '--stream':
        options.stream = true;
        break;
      case '--socket':
        options.socket = takeValue();
        break;
      case '--host':
        options.host = takeValue();
        break;
      case '--port':
        options.port = parseIntFlag('port', takeValue());
        break;
      case '--timeout':
        options.timeoutMs = parseIntFlag('timeout', takeValue()) * 1000;
        break;
      case '--mode':
        options.mode = takeValue();
        break;
      case '--read-limit':
        options.readLimit = parseIntFlag('read-limit', takeValue(), 1);
        break;
      case '--chunk-size':
        options.chunkSize = parseIntFlag('chunk-size', takeValue(), 1);
        break;
      case '--max-connections':
        options.maxConnections = parseIntFlag('max-connections', takeValue(), 1);
        break;
      case '--close-delay':
        options.closeDelayMs = parseIntFlag('close-delay', takeValue());
        break;
      case '--message':
      case '-m':
        options.message = takeValue();
        break;
      default:
        throw new Error(`Unknown option '${flag}'`);
    }
  }

  switch (command) {
    case 'serve':
      return { command: 'serve', options };
    case 'send':
      return { command: 'send', options };
    case 'ping':
      return { command: 'ping', options };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help', options };
    default:
      throw new Error(`Unknown command '${command}'`);
  }
}

function resolveEndpoint(options: GlobalOptions): Endpoint {
  if (options.socket && options.port !== undefined) {
    throw new Error('Use either --socket or --port, not both');
  }
  if (options.socket) return { path: options.socket };
  if (options.port !== undefined) return { host: options.host, port: options.port };
  throw new Error('An endpoint is required: --socket <path> or --port <n>');
}

function buildTransport(options: GlobalOptions): TransportAdapter {
  const endpoint = resolveEndpoint(options);
  return 'path' in endpoint
    ? new UnixSocketTransport({ path: endpoint.path })
    : new TcpTransport({ host: endpoint.host, port: endpoint.port });
}

function printHelp(): void {
  console.log(`Usage:
  ipcd serve (--socket <path> | --port <n> [--host <addr>]) [options]
  ipcd send  (--socket <path> | --port <n> [--host <addr>]) [--message <text>] [--stream]
  ipcd ping  (--socket <path> | --port <n> [--host <addr>])

Serve options:
  --mode <text|stream|persistent>  Framing mode for new connections (default: text)
  --read-limit <bytes>             Max bytes per discrete message
  --chunk-size <bytes>             Max bytes per streamed message
  --max-connections <n>            Max concurrent sessions
  --close-delay <ms>               Pause before closing a finished connection
  --echo                           Reply to every message with its payload

Global options:
  --timeout <seconds>              Client request timeout
  --debug                          Print debug diagnostics
  --quiet, -q                      Suppress non-essential output
  --help, -h                       Show this help

Environment:
  IPCD_READ_LIMIT, IPCD_CHUNK_SIZE, IPCD_MAX_CONNECTIONS, IPCD_DEFAULT_MODE,
  IPCD_CLOSE_DELAY_MS, IPCD_LISTEN_BACKLOG, IPCD_CONNECT_TIMEOUT_MS, IPCD_DEBUG`);
}

async function runServe(options: ServeOptions): Promise<void> {
  const mode = options.mode === undefined ? undefined : parseModeName(options.mode);
  if (options.mode !== undefined && !mode) {
    throw new Error(`Unknown mode '${options.mode}'. Expected text|stream|persistent.`);
  }

  const server: IPCServer = new IPCServer({
    transport: buildTransport(options),
    defaultMode: mode,
    readLimit: options.readLimit,
    chunkSize: options.chunkSize,
    maxConnections: options.maxConnections,
    closeDelayMs: options.closeDelayMs,
    debug: options.debug,
    onMessage: async (message) => {
      if (options.echo) {
        await server.sendMessage(message.data, message.sender);
        return;
      }
      if (!options.quiet) {
        console.log(message.text());
      }
    },
  });

  await server.listen();

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    if (!options.quiet) console.log(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Error during shutdown: ${err instanceof Error ? err.message : err}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function runSend(options: SendCommandOptions): Promise<void> {
  const endpoint = resolveEndpoint(options);
  const payload = options.message ?? (await readStdin());
  const reply = await sendPayload(endpoint, payload, {
    commands: options.stream ? [CommandCode.SET_STREAM] : [],
    timeoutMs: options.timeoutMs ?? getConfig().connectTimeoutMs,
  });
  if (reply.length > 0) {
    process.stdout.write(reply);
  }
}

async function runPing(options: GlobalOptions): Promise<void> {
  const endpoint = resolveEndpoint(options);
  const ok = await ping(endpoint, { timeoutMs: options.timeoutMs });
  if (!ok) {
    console.error(`No PONG from ${describeEndpoint(endpoint)}`);
    process.exit(1);
  }
  if (!options.quiet) console.log('PONG');
}

async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv);
    if (parsed.options.debug) setDebug(true);

    if (parsed.command === 'help' || parsed.options.help) {
      printHelp();
      return;
    }

    switch (parsed.command) {
      case 'serve':
        await runServe(parsed.options);
        return;
      case 'send':
        await runSend(parsed.options);
        return;
      case 'ping':
        await runPing(parsed.options);
        return;
    }
  } catch (error) {
    if (error instanceof ListenerSetupError) {
      console.error(`Error: ${error.message}`);
      process.exit(2);
    }
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}

void main();
