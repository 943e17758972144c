/**
 * CRC-16/XMODEM — poly 0x1021, init 0x0000, no reflection, no xorout.
 * StrKey appends it little-endian after the version byte and payload.
 */

const POLY = 0x1021;

let table: Uint16Array | undefined;

/** Built on first use, never mutated afterwards. */
function crcTable(): Uint16Array {
  if (table) return table;
  const t = new Uint16Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ POLY) & 0xffff : (crc << 1) & 0xffff;
    }
    t[i] = crc;
  }
  table = t;
  return t;
}

export function crc16Xmodem(bytes: Uint8Array): number {
  const t = crcTable();
  let crc = 0;
  for (const byte of bytes) {
    crc = ((crc << 8) & 0xffff) ^ t[((crc >> 8) ^ byte) & 0xff];
  }
  return crc;
}
