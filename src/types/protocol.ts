/**
 * Device line protocol: display controller
 *
 * Every message is one JSON object terminated by `\n`. The role of a line
 * is decided by key presence: `event` wins over `status`; anything else is
 * noise from the device (boot logs, debug prints) and is dropped.
 *
 * The one exception to line mode is the image payload, which follows a
 * `ready` response as raw bytes (see link/imageTransfer.ts).
 */

// ── Controller → Device ──────────────────────────────────────────

export interface DeviceCommand {
  cmd: string;
  [field: string]: unknown;
}

export interface ImageCommand extends DeviceCommand {
  cmd: 'image';
  len: number;
}

export interface MouthCommand extends DeviceCommand {
  cmd: 'mouth';
  open: number;              // 0 = closed smile, 1 = fully open
}

// ── Device → Controller ──────────────────────────────────────────

export type KnownStatus = 'ok' | 'ready' | 'error' | 'timeout' | 'connected' | 'busy';

export interface DeviceResponse {
  status: KnownStatus | (string & {});
  [field: string]: unknown;
}

export type KnownEvent = 'touch' | 'button' | 'button_down' | 'button_up';

export interface DeviceEvent {
  event: KnownEvent | (string & {});
  [field: string]: unknown;
}

// ── Parsed lines ─────────────────────────────────────────────────

export type ParsedLine =
  | { kind: 'event'; event: DeviceEvent }
  | { kind: 'response'; response: DeviceResponse }
  | { kind: 'malformed'; line: string };

/** Returned by every response-awaiting call whose deadline passed. */
export const TIMEOUT_STATUS = 'timeout';

export function timeoutResponse(): DeviceResponse {
  return { status: TIMEOUT_STATUS };
}

export function isTimeout(response: DeviceResponse): boolean {
  return response.status === TIMEOUT_STATUS;
}
