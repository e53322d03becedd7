/**
 * Binary Windows security identifier to its string form, e.g. S-1-5-21-...-500.
 * Layout: revision (1 byte), sub-authority count (1), identifier authority
 * (6, big-endian), then count x 4-byte little-endian sub-authorities.
 */
export function sidToString(buf: Buffer): string {
  if (buf.length < 8) throw new Error(`SID too short: ${buf.length} bytes`);
  const revision = buf.readUInt8(0);
  const count = buf.readUInt8(1);
  if (buf.length < 8 + count * 4) throw new Error(`SID truncated: expected ${count} sub-authorities`);
  const authority = buf.readUIntBE(2, 6);
  const parts = [`S-${revision}-${authority}`];
  for (let i = 0; i < count; i++) {
    parts.push(String(buf.readUInt32LE(8 + i * 4)));
  }
  return parts.join('-');
}
