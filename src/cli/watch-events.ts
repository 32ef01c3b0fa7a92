import { loadConfig } from '../config.js';
import { isButtonPress, pollEvents } from '../device/events.js';
import { isConnectionClosed } from '../link/errors.js';
import { connectDisplay } from './connect.js';

// Usage: npx tsx src/cli/watch-events.ts [port-or-host]
// Prints touches and button presses until Ctrl+C.

async function main() {
  const link = await connectDisplay(process.argv[2], loadConfig());
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  console.log('Watching events (Ctrl+C to stop)...');
  try {
    for await (const event of pollEvents(link, { signal: controller.signal })) {
      const press = isButtonPress(event) ? '  <- button press' : '';
      console.log(`${new Date().toISOString()} ${JSON.stringify(event)}${press}`);
    }
  } catch (err) {
    if (!isConnectionClosed(err)) throw err;
    console.log('Display disconnected.');
  } finally {
    await link.close();
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
