/**
 * Hex + ASCII dump of raw frame bytes, for debug logs
 *
 * @param data - Bytes to dump
 * @param bytesPerLine - Bytes shown on each output line
 */
export function hexAndAscii(data: Buffer, bytesPerLine: number = 16): string {
  const lines: string[] = [];
  for (let offset = 0; offset < data.length; offset += bytesPerLine) {
    const chunk = data.subarray(offset, offset + bytesPerLine);
    const hex = Array.from(chunk, (byte) => byte.toString(16).toUpperCase().padStart(2, "0"));
    const ascii = Array.from(chunk, (byte) =>
      byte >= 32 && byte < 127 ? String.fromCharCode(byte) : "."
    );
    lines.push(`${hex.join(" ").padEnd(bytesPerLine * 3 - 1)} ${ascii.join("")}`);
  }
  return lines.join("\n");
}
