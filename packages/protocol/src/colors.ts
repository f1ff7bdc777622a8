/**
 * WeeChat color codes embedded in strings (titles, prefixes, messages).
 *
 *   0x19  color: "NN", "F"/"B" + color, "*" + fg[,bg], "@NNNNN", "bX", "E", 0x1C
 *   0x1A  set attribute (+1 char)
 *   0x1B  remove attribute (+1 char)
 *   0x1C  reset
 */

const ATTRS = "[*!/_|]*";
const STD = `(?:${ATTRS}\\d{2})`;
const EXT = `(?:@${ATTRS}\\d{5})`;
const ANY = `(?:${STD}|${EXT})`;

const COLOR_PATTERN = new RegExp(
  `\\x19(?:\\d{2}|F${ANY}|B\\d{2}|B@\\d{5}|E|\\*${ANY}(?:,${ANY})?|@\\d{5}|b.|\\x1C)` +
    `|\\x1A.|\\x1B.|\\x1C`,
  "gs"
);

/**
 * Remove every color and attribute code from a WeeChat string
 */
export function stripColors(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(COLOR_PATTERN, "");
}
