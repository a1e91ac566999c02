/**
 * Public IPC API.
 *
 * Consumers embedding ipcd as a library import from this barrel to access the
 * server core, transports, session types and the client helpers without
 * reaching into individual file paths.
 */

export * from './server.ts';
export * from './session.ts';
export * from './pool.ts';
export * from './connection.ts';
export * from './message.ts';
export * from './command.ts';
export * from './errors.ts';
export * from './reader.ts';
export * from './client.ts';
export { toBytes, type Payload } from './io.ts';
export * from './transports/types.ts';
export * from './transports/unix.ts';
export * from './transports/tcp.ts';
export { getConfig, resolveConfig, parseModeName, ENV_VARS, type IPCDConfig } from '../config.ts';
