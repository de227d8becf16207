/**
 * Public daemon system API exports.
 *
 * Consumers embedding stagehub as a library can import from this barrel to
 * reach the registry, launcher, hub and stream client without reaching into
 * individual file paths.
 */

export * from './errors.ts';
export * from './identity.ts';
export * from './protocol.ts';
export * from './registry.ts';
export * from './spawn.ts';
export * from './launcher.ts';
export * from './hub.ts';
export * from './server.ts';
export * from './engine.ts';
export * from './daemon.ts';
export * from './stream.ts';
export * from './client.ts';
export * from './commands.ts';
