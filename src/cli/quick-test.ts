import { setTimeout as sleep } from 'node:timers/promises';
import { loadConfig } from '../config.js';
import { FaceDisplay } from '../device/FaceDisplay.js';
import { connectDisplay } from './connect.js';

// Usage: npx tsx src/cli/quick-test.ts [port-or-host]
// Cycles the screen through red/green/blue, beeps, and runs the face briefly.

async function main() {
  const config = loadConfig();
  const link = await connectDisplay(process.argv[2], config);
  const display = new FaceDisplay(link);

  try {
    for (const [name, color] of [['RED', '#FF0000'], ['GREEN', '#00FF00'], ['BLUE', '#0000FF']]) {
      console.log(`Clearing screen to ${name}...`);
      console.log('  Response:', await display.clear(color));
      await sleep(1000);
    }

    console.log('\nSending tone...');
    console.log('  Response:', await display.tone(1000, 300));
    await sleep(500);

    console.log('\nFace on, blink, hearts...');
    await display.faceOn();
    await display.blink();
    await display.setLove(0.6);
    await sleep(2000);
    await display.faceOff();

    console.log('\nClearing to black...');
    console.log('  Response:', await display.clear('#000000'));
    console.log('  Wi-Fi:', await display.wifiStatus());
  } finally {
    await link.close();
  }
  console.log('\nQuick test complete!');
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
