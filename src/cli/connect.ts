import type { Config } from '../config.js';
import { linkTimeouts } from '../config.js';
import type { LinkSession } from '../link/LinkSession.js';
import { openLink, resolveLinkTarget } from '../link/openLink.js';
import { autoDetectSerialPath } from '../link/serialTransport.js';

/**
 * Open the display named on the command line, else SENSECAP_HOST, else the
 * first likely USB serial port. Serial links drop the board's boot chatter.
 */
export async function connectDisplay(hostArg: string | undefined, config: Config): Promise<LinkSession> {
  const host = hostArg ?? config.SENSECAP_HOST ?? await autoDetectSerialPath();
  const options = { baudRate: config.BAUD, port: config.LINK_PORT, session: linkTimeouts(config) };

  const link = await openLink(host, options);
  if (resolveLinkTarget(host, options).kind === 'serial') await link.drainBoot();
  return link;
}
