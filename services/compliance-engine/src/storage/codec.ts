import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

const UINT64_WIDTH = 8;
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export class CorruptValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CorruptValueError";
  }
}

/** Fixed-width big-endian encoding; a value always maps to the same 8 bytes. */
export function encodeUint64(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as uint64`);
  }
  const bytes = new Uint8Array(UINT64_WIDTH);
  new DataView(bytes.buffer).setBigUint64(0, BigInt(value));
  return bytes;
}

export function decodeUint64(bytes: Uint8Array): number {
  if (bytes.length !== UINT64_WIDTH) {
    throw new CorruptValueError(`Expected ${UINT64_WIDTH}-byte integer, got ${bytes.length} bytes`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const value = view.getBigUint64(0);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CorruptValueError(`Stored integer ${value.toString()} exceeds the safe range`);
  }
  return Number(value);
}

export function encodeUtf8(value: string): Uint8Array {
  return utf8ToBytes(value);
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new CorruptValueError(
      `Stored value ${bytesToHex(bytes)} is not valid UTF-8: ${error instanceof Error ? error.message : "unknown_error"}`,
    );
  }
}
