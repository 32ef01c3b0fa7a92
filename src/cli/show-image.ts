import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { isTimeout } from '../types/protocol.js';
import { FaceDisplay, DISPLAY_WIDTH, DISPLAY_HEIGHT } from '../device/FaceDisplay.js';
import { connectDisplay } from './connect.js';

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 1) {
    console.error('Usage: npx tsx src/cli/show-image.ts <image.jpg> [port-or-host]');
    console.error(`  The JPEG should already be ${DISPLAY_WIDTH}x${DISPLAY_HEIGHT}; it is sent as-is.`);
    process.exit(1);
  }

  const [imagePath, host] = args;
  const jpeg = await readFile(resolve(imagePath));
  const link = await connectDisplay(host, loadConfig());

  try {
    const started = performance.now();
    const response = await new FaceDisplay(link).showJpeg(jpeg);
    const ms = performance.now() - started;
    console.log(`Sent ${jpeg.length} bytes in ${ms.toFixed(0)}ms:`, response);
    if (isTimeout(response)) console.error('Display did not answer in time.');
    if (response.status !== 'ok') process.exitCode = 1;
  } finally {
    await link.close();
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
