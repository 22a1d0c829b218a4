import { promises as fs } from "fs";
import { AdapterOutput } from "../pipeline/types";
import { degraded, ReadOptions } from "./result";

type Encoding = "utf-8" | "utf-16le" | "utf-16be" | "utf-32le" | "utf-32be";

// UTF-32LE shares its first two bytes with UTF-16LE, so it is checked first.
const BYTE_ORDER_MARKS: Array<{ bytes: number[]; encoding: Encoding }> = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: "utf-8" },
  { bytes: [0xff, 0xfe, 0x00, 0x00], encoding: "utf-32le" },
  { bytes: [0x00, 0x00, 0xfe, 0xff], encoding: "utf-32be" },
  { bytes: [0xff, 0xfe], encoding: "utf-16le" },
  { bytes: [0xfe, 0xff], encoding: "utf-16be" },
];

const SAMPLE_SIZE = 4096;
const ALLOWED_CONTROL_BYTES = new Set([7, 8, 9, 10, 12, 13, 27, 32]);
const ESCAPE_FOLLOWERS = new Set([0x5b, 0x28, 0x5d, 0x5f]); // [ ( ] _

export function sniffBom(buffer: Uint8Array): { encoding: Encoding; length: number } | undefined {
  const match = BYTE_ORDER_MARKS.find(
    ({ bytes }) => buffer.length >= bytes.length && bytes.every((byte, index) => buffer[index] === byte),
  );
  return match ? { encoding: match.encoding, length: match.bytes.length } : undefined;
}

function hasTerminalEscapes(sample: Uint8Array): boolean {
  for (let index = 0; index < sample.length - 1; index += 1) {
    if (sample[index] === 0x1b && ESCAPE_FOLLOWERS.has(sample[index + 1])) {
      return true;
    }
  }
  return false;
}

/**
 * Heuristic binary check over the first 4 KiB of a file that carried no
 * byte order mark.
 */
export function looksBinary(content: Uint8Array): boolean {
  const sample = content.subarray(0, SAMPLE_SIZE);
  if (sample.length === 0) {
    return false;
  }

  let nulRun = 0;
  let nulCount = 0;
  let controlCount = 0;
  const frequencies = new Map<number, number>();

  for (const byte of sample) {
    if (byte === 0) {
      nulRun += 1;
      nulCount += 1;
      if (nulRun >= 4) {
        return true;
      }
    } else {
      nulRun = 0;
    }
    if (byte < 32 && !ALLOWED_CONTROL_BYTES.has(byte)) {
      controlCount += 1;
    }
    frequencies.set(byte, (frequencies.get(byte) ?? 0) + 1);
  }

  if (nulCount / sample.length > 0.1) {
    return true;
  }

  const escapes = hasTerminalEscapes(sample);
  if (controlCount / sample.length > 0.3 && !escapes) {
    return true;
  }

  if (sample.length > 1000 && !escapes) {
    const common = [...frequencies.entries()].filter(([, count]) => count / sample.length > 0.05);
    const printable = common.filter(([byte]) => byte >= 32 && byte <= 126).length;
    if (common.length > 8 && printable < common.length - 2) {
      return true;
    }
  }

  return false;
}

function decodeUtf32(bytes: Uint8Array, littleEndian: boolean): string {
  if (bytes.length % 4 !== 0) {
    throw new RangeError("UTF-32 data is not a whole number of code units");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const codePoints: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += 4) {
    const codePoint = view.getUint32(offset, littleEndian);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw new RangeError(`Invalid UTF-32 code point at byte ${offset}`);
    }
    codePoints.push(codePoint);
  }
  // fromCodePoint takes its arguments on the stack, so decode in slices.
  let text = "";
  for (let start = 0; start < codePoints.length; start += 8192) {
    text += String.fromCodePoint(...codePoints.slice(start, start + 8192));
  }
  return text;
}

function decodeText(bytes: Uint8Array, encoding: Encoding): string {
  if (encoding === "utf-32le" || encoding === "utf-32be") {
    return decodeUtf32(bytes, encoding === "utf-32le");
  }
  return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes);
}

export async function readTxt(filePath: string, options: ReadOptions = {}): Promise<AdapterOutput> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    return degraded("text", filePath, "unreadable file", error, options.logger);
  }

  const bom = sniffBom(buffer);
  if (!bom && looksBinary(buffer)) {
    return degraded("text", filePath, "binary content", undefined, options.logger);
  }

  let text: string;
  try {
    text = bom
      ? decodeText(buffer.subarray(bom.length), bom.encoding)
      : decodeText(buffer, "utf-8");
  } catch (error) {
    return degraded("text", filePath, "undecodable text", error, options.logger);
  }

  return {
    kind: "text",
    text: text.replace(/\ufeff/g, ""),
    meta: {
      sourcePath: filePath,
    },
  };
}
