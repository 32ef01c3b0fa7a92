/**
 * Servo arm + backlight board on its own serial line.
 *
 * Plain-text protocol, one command per line, no replies read:
 *   S<angle>        servo angle in degrees
 *   C<r>,<g>,<b>    LCD backlight colour
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Transport } from '../link/transport.js';
import { SerialTransport } from '../link/serialTransport.js';

export const SERVO_BAUD_RATE = 115_200;
export const SERVO_MIN = 120;
export const SERVO_MAX = 150;
export const SERVO_INIT_ANGLE = 135;

export class ServoController {
  constructor(private readonly transport: Transport) {}

  /** Open the port, let the board boot, drop its boot output and park the arm. */
  static async open(
    path: string,
    baudRate: number = SERVO_BAUD_RATE,
    initAngle: number = SERVO_INIT_ANGLE,
  ): Promise<ServoController> {
    const transport = await SerialTransport.open(path, baudRate);
    await sleep(500);
    transport.discardInput();
    console.log(`[servo] Connected to ${path}`);

    const servo = new ServoController(transport);
    const angle = await servo.setAngle(initAngle);
    console.log(`[servo] Init angle S${angle}`);
    return servo;
  }

  /** Interest 0–10 → love level 0–1 for the face's hearts. */
  static interestToLove(interest: number): number {
    return Math.max(0, Math.min(1, interest / 10));
  }

  /** Interest 0–10 → servo angle across [SERVO_MIN, SERVO_MAX], truncated. */
  static interestToServo(interest: number): number {
    const t = Math.max(0, Math.min(10, interest)) / 10;
    return Math.trunc(SERVO_MIN + t * (SERVO_MAX - SERVO_MIN));
  }

  /** Returns the angle actually sent after clamping. */
  async setAngle(angle: number): Promise<number> {
    const clamped = Math.max(SERVO_MIN, Math.min(SERVO_MAX, Math.trunc(angle)));
    await this.transport.write(Buffer.from(`S${clamped}\n`, 'ascii'));
    return clamped;
  }

  async setColor(r: number, g: number, b: number): Promise<void> {
    const channel = (v: number) => Math.max(0, Math.min(255, Math.round(v)));
    await this.transport.write(Buffer.from(`C${channel(r)},${channel(g)},${channel(b)}\n`, 'ascii'));
  }

  /** Drive the arm from an interest score and return the matching love level. */
  async setInterest(interest: number): Promise<number> {
    const angle = await this.setAngle(ServoController.interestToServo(interest));
    console.log(`[servo] interest=${interest} -> angle=${angle}`);
    return ServoController.interestToLove(interest);
  }

  async close(): Promise<void> {
    await this.transport.close();
    console.log('[servo] Closed');
  }
}
