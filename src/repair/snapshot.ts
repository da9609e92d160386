import type { FittedBox } from "../schema/geometry.js";
import type { BoxSnapshot } from "../schema/fix.js";

export function snapshotBox(box: FittedBox): BoxSnapshot {
  return {
    id: box.id,
    rect: { ...box.rect },
    fontFamily: box.fontFamily,
    fontSize: box.fontSize,
    text: box.text,
    lineCount: box.lines.length,
    textHeight: box.textHeight,
    truncated: box.truncated,
    style: { ...box.style },
  };
}

export function snapshotsEqual(a: readonly BoxSnapshot[], b: readonly BoxSnapshot[]): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
