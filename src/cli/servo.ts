import { setTimeout as sleep } from 'node:timers/promises';
import { loadConfig } from '../config.js';
import { ServoController } from '../device/ServoController.js';
import { autoDetectSerialPath } from '../link/serialTransport.js';

async function main() {
  const args = process.argv.slice(2);
  const interest = Number(args[0]);
  if (args.length < 1 || Number.isNaN(interest)) {
    console.error('Usage: npx tsx src/cli/servo.ts <interest 0-10> [r,g,b]');
    console.error('  Opens SERVO_PORT (or the first USB serial port) at SERVO_BAUD.');
    process.exit(1);
  }

  const config = loadConfig();
  const servo = await ServoController.open(config.SERVO_PORT ?? await autoDetectSerialPath(), config.SERVO_BAUD);
  try {
    const love = await servo.setInterest(interest);
    console.log(`Love level for the face: ${love.toFixed(2)}`);
    if (args[1]) {
      const [r, g, b] = args[1].split(',').map(Number);
      await servo.setColor(r || 0, g || 0, b || 0);
    }
    // let the arm finish moving before the port closes
    await sleep(300);
  } finally {
    await servo.close();
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
