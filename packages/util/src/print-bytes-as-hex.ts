/**
 * Hex dump of a byte range: two digits per byte, delimiter between bytes.
 *
 * `new PrintBytesAsHex(new Uint8Array([0xde, 0xad]))` prints `DE AD`.
 * Delimiter and digit case default to the `hex.delimiter` and
 * `hex.uppercase` configuration keys.
 */

import { config, InvalidSizeError } from "@tinystd/core";

export type ByteSource = ArrayBufferView | ArrayBuffer | readonly number[];

export interface HexOptions {
  delimiter?: string;
  uppercase?: boolean;
}

export interface TextSink {
  write(chunk: string): unknown;
}

function toBytes(data: ByteSource): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (ArrayBuffer.isView(data)) return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Uint8Array.from(data);
}

export class PrintBytesAsHex {
  readonly bytes: Uint8Array;
  readonly delimiter: string;
  readonly uppercase: boolean;

  /**
   * @throws InvalidSizeError when `data` holds no bytes
   */
  constructor(data: ByteSource, options: HexOptions = {}) {
    this.bytes = toBytes(data);
    if (this.bytes.length === 0) {
      throw new InvalidSizeError("PrintBytesAsHex needs at least one byte");
    }
    this.delimiter = options.delimiter ?? config.getString("hex.delimiter", " ");
    this.uppercase = options.uppercase ?? config.getBoolean("hex.uppercase", true);
  }

  toString(): string {
    const parts: string[] = [];
    for (const byte of this.bytes) {
      const digits = byte.toString(16).padStart(2, "0");
      parts.push(this.uppercase ? digits.toUpperCase() : digits);
    }
    return parts.join(this.delimiter);
  }

  writeTo(sink: TextSink): void {
    sink.write(this.toString());
  }
}

export function printBytesAsHex(data: ByteSource, options: HexOptions = {}): string {
  return new PrintBytesAsHex(data, options).toString();
}
