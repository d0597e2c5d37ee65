// CRC-32 (IEEE, reflected) used to fingerprint framebuffers in tests and harness output
let table: Uint32Array | null = null;

const buildTable = (): Uint32Array => {
  const t = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) c = (c & 1) ? (0xEDB88320 ^ (c >>> 1)) : (c >>> 1);
    t[n] = c >>> 0;
  }
  return t;
};

export function crc32(bytes: Uint8Array, seed = 0): number {
  const t = table ?? (table = buildTable());
  let crc = (seed ^ 0xFFFFFFFF) >>> 0;
  for (const b of bytes) crc = t[(crc ^ b) & 0xFF] ^ (crc >>> 8);
  return (crc ^ 0xFFFFFFFF) >>> 0;
}
