import { z } from 'zod';
import type { DeviceCommand, ParsedLine } from '../types/protocol.js';

const JsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Decide the role of one trimmed line. `event` takes precedence over
 * `status`; non-JSON and JSON without either key are malformed.
 */
export function classifyLine(line: string): ParsedLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { kind: 'malformed', line };
  }

  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) return { kind: 'malformed', line };
  const obj = result.data;

  if ('event' in obj) {
    return { kind: 'event', event: { ...obj, event: String(obj.event) } };
  }
  if ('status' in obj) {
    return { kind: 'response', response: { ...obj, status: String(obj.status) } };
  }
  return { kind: 'malformed', line };
}

export function encodeCommand(command: DeviceCommand): Buffer {
  return Buffer.from(JSON.stringify(command) + '\n', 'utf-8');
}
