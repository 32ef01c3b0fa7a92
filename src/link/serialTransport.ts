import { SerialPort } from 'serialport';
import { DuplexTransport } from './transport.js';
import { TransportError } from './errors.js';

export const DISPLAY_BAUD_RATE = 921_600;

// USB vendor IDs of the bridge chips found on the boards we drive
const KNOWN_VENDOR_IDS = ['1a86', '303a']; // CH340, Espressif native USB

export class SerialTransport extends DuplexTransport {
  readonly description: string;

  private constructor(private readonly port: SerialPort, path: string, baudRate: number) {
    super(port);
    this.description = `serial ${path}@${baudRate}`;
  }

  static async open(path: string, baudRate: number = DISPLAY_BAUD_RATE): Promise<SerialTransport> {
    const port = new SerialPort({ path, baudRate, autoOpen: false });
    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new TransportError('OPEN_FAILED', `Cannot open serial port ${path}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
    return new SerialTransport(port, path, baudRate);
  }

  protected async flushWrites(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.drain((err) => {
        if (err) {
          reject(new TransportError('WRITE_FAILED', `${this.description}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Pick the serial device the display is most likely attached to: a CH340 or
 * Espressif USB bridge first, otherwise whatever port is listed first.
 */
export async function autoDetectSerialPath(): Promise<string> {
  const ports = await SerialPort.list();
  const known = ports.find(p => KNOWN_VENDOR_IDS.includes((p.vendorId ?? '').toLowerCase()));
  if (known) return known.path;
  if (ports.length > 0) return ports[0].path;
  throw new TransportError('OPEN_FAILED', 'No serial port found. Specify the port explicitly.');
}
