import type { DeviceResponse, ImageCommand } from '../types/protocol.js';
import type { ExclusiveChannel } from './LinkSession.js';

export interface ImageTransferTimeouts {
  readyTimeoutMs: number;
  /** Covers on-device decode of the payload, so it is the longer of the two. */
  decodeTimeoutMs: number;
}

/**
 * Three-phase image handshake:
 *
 *   1. `{"cmd":"image","len":N}` → device answers `ready`, or anything else to refuse
 *   2. N raw bytes, no framing (the only time the stream leaves line mode)
 *   3. device answers with the decode result
 *
 * A refusal in phase 1 is returned as-is and nothing else is written. Other
 * writers are held off from the command line until the last payload byte,
 * because the device reads everything after `image` as payload.
 */
export async function transferImage(
  channel: ExclusiveChannel,
  payload: Uint8Array,
  timeouts: ImageTransferTimeouts,
): Promise<DeviceResponse> {
  const command: ImageCommand = { cmd: 'image', len: payload.length };

  const refusal = await channel.holdWrites(async () => {
    await channel.writeLine(command);
    const ready = await channel.awaitResponse(timeouts.readyTimeoutMs);
    if (ready.status !== 'ready') return ready;
    await channel.writeBytes(payload);
    return null;
  });
  if (refusal) return refusal;

  return channel.awaitResponse(timeouts.decodeTimeoutMs);
}
