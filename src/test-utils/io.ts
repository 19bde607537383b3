import type { MaintIO } from "../utils/io.js";

/** Plain-print sink: every line lands in `lines` exactly as emitted. */
export function createTestIO(): { io: MaintIO; lines: string[] } {
  const lines: string[] = [];
  return { io: { print: (msg) => lines.push(msg) }, lines };
}
