import { LinkSession, type LinkSessionOptions } from './LinkSession.js';
import { SerialTransport, DISPLAY_BAUD_RATE } from './serialTransport.js';
import { SocketTransport, DEFAULT_LINK_PORT, DEFAULT_CONNECT_TIMEOUT_MS } from './socketTransport.js';
import type { Transport } from './transport.js';

export type LinkTarget =
  | { kind: 'serial'; path: string; baudRate: number }
  | { kind: 'socket'; host: string; port: number };

export interface OpenLinkOptions {
  baudRate?: number;
  port?: number;
  connectTimeoutMs?: number;
  greetingTimeoutMs?: number;
  session?: Partial<LinkSessionOptions>;
}

const SERIAL_PATTERN = /^(COM\d+|\/dev\/.+|\\\\\.\\.+)$/i;

/**
 * `COM6`, `/dev/ttyUSB0` and `\\.\COM12` are serial devices; anything else is a
 * hostname or IP, optionally `host:port`. IPv6 takes a port only in brackets
 * (`[::1]:7777`); a bare IPv6 address uses the default port.
 */
export function resolveLinkTarget(host: string, options: OpenLinkOptions = {}): LinkTarget {
  const trimmed = host.trim();
  if (SERIAL_PATTERN.test(trimmed)) {
    return { kind: 'serial', path: trimmed, baudRate: options.baudRate ?? DISPLAY_BAUD_RATE };
  }

  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    const port = bracketed[2] === undefined ? options.port ?? DEFAULT_LINK_PORT : Number(bracketed[2]);
    return { kind: 'socket', host: bracketed[1], port };
  }

  const match = /^(.+):(\d+)$/.exec(trimmed);
  if (match && !match[1].includes(':')) {
    return { kind: 'socket', host: match[1], port: Number(match[2]) };
  }
  return { kind: 'socket', host: trimmed, port: options.port ?? DEFAULT_LINK_PORT };
}

export async function openLink(host: string, options: OpenLinkOptions = {}): Promise<LinkSession> {
  const target = resolveLinkTarget(host, options);

  let transport: Transport;
  if (target.kind === 'serial') {
    console.log(`[link] Opening ${target.path} at ${target.baudRate} baud...`);
    transport = await SerialTransport.open(target.path, target.baudRate);
  } else {
    console.log(`[link] Connecting to ${target.host}:${target.port}...`);
    transport = await SocketTransport.connect(target.host, target.port, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
  }

  const session = new LinkSession(transport, options.session);
  if (target.kind === 'socket') {
    const greeting = await session.awaitGreeting(options.greetingTimeoutMs ?? 3000);
    console.log(`[link] Connected (${JSON.stringify(greeting)})`);
  }
  return session;
}
