/*
Bytes received by the browser page, stamped with wall-clock time so a cell's
share can be looked up once its execution window is known.
*/

export const MEGABYTE = 1024 * 1024;

// Websocket opcode of binary frames; their payload arrives base64 encoded.
const BINARY_OPCODE = 2;

export function websocketPayloadBytes(opcode: number, payloadData: string): number {
  return opcode === BINARY_OPCODE
    ? Buffer.byteLength(payloadData, "base64")
    : Buffer.byteLength(payloadData, "utf8");
}

type Entry = { at: number; bytes: number };

export class NetworkLog {
  private readonly entries: Entry[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  record(bytes: number, at: number = this.now()): void {
    if (bytes > 0) {
      this.entries.push({ at, bytes });
    }
  }

  // Bytes received strictly between start and end (epoch ms).
  bytesReceived(start: number, end: number): number {
    let total = 0;
    for (const { at, bytes } of this.entries) {
      if (start < at && at < end) total += bytes;
    }
    return total;
  }

  dataReceivedMB(start: number, end: number): number {
    return this.bytesReceived(start, end) / MEGABYTE;
  }
}
