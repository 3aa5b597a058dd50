import type WebSocket from "ws";

export function rawDataToString(data: WebSocket.RawData, encoding: BufferEncoding = "utf8"): string {
  if (Buffer.isBuffer(data)) return data.toString(encoding);
  if (Array.isArray(data)) return Buffer.concat(data).toString(encoding);
  return Buffer.from(data).toString(encoding);
}

export function rawDataByteLength(data: WebSocket.RawData): number {
  if (Buffer.isBuffer(data)) return data.length;
  if (Array.isArray(data)) return data.reduce((total, chunk) => total + chunk.length, 0);
  return data.byteLength;
}
