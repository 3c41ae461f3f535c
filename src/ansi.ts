// Matches, in order of precedence:
//   OSC      ESC ] ... (BEL | ESC \)
//   DCS/SOS/PM/APC  ESC P|X|^|_ ... ESC \
//   CSI      (ESC [ | 0x9B) params intermediates final
//   nF/Fp/Fe ESC intermediates final (charset selection, ESC 7, ESC =, ...)
//   a stray ESC or 0x9B with nothing usable after it
const ANSI_PATTERN =
  /\u001B\][^\u0007\u001B]*(?:\u0007|\u001B\\)|\u001B[PX^_][\s\S]*?\u001B\\|(?:\u001B\[|\u009B)[0-?]*[ -\/]*[@-~]|\u001B[ -\/]*[0-~]|[\u001B\u009B]/g;

/**
 * Remove terminal control sequences from captured pane text.
 *
 * Every ESC and C1 CSI byte is consumed by some alternative, so the result never contains
 * one and a second pass is a no-op.
 */
export function stripAnsi(text: string): string {
  if (!text) {
    return "";
  }
  return text.replace(ANSI_PATTERN, "");
}
