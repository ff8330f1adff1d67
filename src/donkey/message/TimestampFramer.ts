/**
 * Purpose: Locate message boundaries in an un-delimited ACARS text stream
 *
 * Key behaviors:
 * - A message starts at a line of the form `HH:MM:SS DD-MM-YY UTC` at column 0
 * - Ordinary framing needs a delimiter pair: the last message in a buffer is never complete
 * - Forced framing (idle sources) takes everything from the first delimiter to buffer end
 * - Emitted message text is whitespace-trimmed; offsets always refer to the untrimmed buffer
 */

/**
 * Timestamp line marking the start of a message. The lookbehind anchors the
 * match to buffer start or the character after a "\n".
 */
export const DELIMITER_PATTERN = /(?<![^\n])\d{2}:\d{2}:\d{2} \d{2}-\d{2}-\d{2} UTC/g;

/**
 * One extracted message. `start`/`end` delimit the untrimmed span in the buffer.
 */
export interface Frame {
  start: number;
  end: number;
  text: string;
}

export interface FrameExtraction {
  /** Complete messages, in delimiter order */
  frames: Frame[];
  /** Length of the buffer prefix the frames account for (0 when nothing was extracted) */
  consumed: number;
}

/**
 * Offsets of every delimiter occurrence, ascending.
 */
export function findDelimiterOffsets(text: string): number[] {
  const offsets: number[] = [];
  for (const match of text.matchAll(DELIMITER_PATTERN)) {
    if (match.index !== undefined) {
      offsets.push(match.index);
    }
  }
  return offsets;
}

/**
 * Offset of the first delimiter, or -1.
 */
export function findFirstDelimiter(text: string): number {
  const pattern = new RegExp(DELIMITER_PATTERN.source);
  const match = pattern.exec(text);
  return match ? match.index : -1;
}

function toFrame(text: string, start: number, end: number): Frame {
  return { start, end, text: text.slice(start, end).trim() };
}

/**
 * Ordinary framing. Emits one frame per adjacent delimiter pair; with fewer
 * than two delimiters nothing is extractable and nothing is consumed.
 */
export function extractFrames(buffer: string): FrameExtraction {
  const offsets = findDelimiterOffsets(buffer);
  if (offsets.length < 2) {
    return { frames: [], consumed: 0 };
  }

  const frames: Frame[] = [];
  for (let i = 0; i < offsets.length - 1; i++) {
    const start = offsets[i];
    const end = offsets[i + 1];
    if (start !== undefined && end !== undefined) {
      frames.push(toFrame(buffer, start, end));
    }
  }

  return { frames, consumed: offsets[offsets.length - 1] ?? 0 };
}

/**
 * Forced framing for an idle source: everything from the first delimiter to
 * buffer end, unconfirmed by a following delimiter. Null when the buffer has
 * no delimiter at all.
 */
export function extractPendingFrame(buffer: string): Frame | null {
  const first = findFirstDelimiter(buffer);
  if (first < 0) {
    return null;
  }
  return toFrame(buffer, first, buffer.length);
}

/**
 * Split a complete document (e.g. a saved log file) into every message; the
 * last one runs to end of input.
 */
export function splitAll(content: string): Frame[] {
  const offsets = findDelimiterOffsets(content);
  return offsets.map((start, i) => toFrame(content, start, offsets[i + 1] ?? content.length));
}
