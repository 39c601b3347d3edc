import { InvalidConfigurationError } from "./errors";
import type { Chunk } from "./types";

/** Paragraph, line, sentence, word, then single characters. */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " ", ""];

export interface ChunkerOptions {
  /**
   * Separators in priority order. An empty string (character splitting) is
   * always appended when missing so splitting terminates.
   */
  separators?: readonly string[];
}

/** Where the chunks of one `split` call sit within the document. */
export interface ChunkOrigin {
  pageIndex?: number;
  /** `sequenceIndex` given to the first chunk produced. */
  sequenceStart?: number;
}

/** Half-open span `[start, end)` of the text being split. */
interface Span {
  start: number;
  end: number;
}

/**
 * Reject chunk parameters that cannot make forward progress.
 *
 * @throws {InvalidConfigurationError} unless `chunkSize` is a positive integer
 *   and `chunkOverlap` an integer in `[0, chunkSize)`.
 */
export function validateChunkParams(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be a non-negative integer (got ${chunkOverlap})`,
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `chunkOverlap (=${chunkOverlap}) must be smaller than chunkSize (=${chunkSize})`,
    );
  }
}

/**
 * Recursive separator-based splitter producing overlapping chunks with exact
 * offsets into the input.
 *
 * The text is first cut into atoms no longer than `chunkSize - chunkOverlap`,
 * using the coarsest separator that gets a piece under that bound (separators
 * stay attached to the end of the piece they terminate). Atoms are then packed
 * greedily into chunks of at most `chunkSize` characters. Each chunk after the
 * first starts at the earliest atom boundary within the previous chunk's last
 * `chunkOverlap` characters. Failing that, it starts right after the
 * highest-priority separator found in that window, and only with no separator
 * there at all does it take a hard character cut at exactly `chunkOverlap`
 * characters. Since no
 * atom exceeds `chunkSize - chunkOverlap`, the overlap always leaves room for
 * the next atom.
 */
export class Chunker {
  private readonly separators: readonly string[];

  public constructor(opts: ChunkerOptions = {}) {
    const seps = (opts.separators ?? DEFAULT_SEPARATORS).filter(
      (s, i, all) => all.indexOf(s) === i,
    );
    this.separators = seps.includes("") ? seps.filter((s) => s !== "").concat("") : [...seps, ""];
  }

  /**
   * Split `text` into ordered, overlapping chunks.
   *
   * @param text Normalized page text.
   * @param chunkSize Maximum characters per chunk.
   * @param chunkOverlap Characters shared with the previous chunk.
   * @param origin Page index and first sequence index stamped on the chunks.
   */
  public split(
    text: string,
    chunkSize: number,
    chunkOverlap: number,
    origin: ChunkOrigin = {},
  ): Chunk[] {
    validateChunkParams(chunkSize, chunkOverlap);
    const pageIndex = origin.pageIndex ?? 0;
    let sequenceIndex = origin.sequenceStart ?? 0;
    if (text.length === 0) return [];

    const atoms: Span[] = [];
    this.atomize(text, { start: 0, end: text.length }, 0, chunkSize - chunkOverlap, atoms);

    const chunks: Chunk[] = [];
    let start = 0;
    let next = 0;
    while (next < atoms.length) {
      let end = start;
      while (next < atoms.length && atoms[next].end - start <= chunkSize) {
        end = atoms[next].end;
        next++;
      }
      chunks.push(
        Object.freeze({
          text: text.slice(start, end),
          sourcePageIndex: pageIndex,
          startOffset: start,
          endOffset: end,
          sequenceIndex: sequenceIndex++,
        }),
      );
      if (next >= atoms.length) break;
      start = this.overlapStart(text, atoms, next, end, chunkOverlap);
    }
    return chunks;
  }

  /**
   * Start offset of the chunk following one that ends at `end`, where
   * `atoms[next]` is the first atom not yet emitted.
   */
  private overlapStart(
    text: string,
    atoms: readonly Span[],
    next: number,
    end: number,
    chunkOverlap: number,
  ): number {
    if (chunkOverlap === 0) return end;
    const windowStart = end - chunkOverlap;
    let boundary = -1;
    for (let i = next - 1; i >= 0 && atoms[i].start >= windowStart; i--) {
      boundary = atoms[i].start;
    }
    if (boundary >= 0) return boundary;
    const snapped = this.separatorBoundary(text, windowStart, end);
    if (snapped >= 0) return snapped;
    // Hard cut; step past a low surrogate so a pair is not torn apart.
    return isLowSurrogate(text, windowStart) && windowStart + 1 < end
      ? windowStart + 1
      : windowStart;
  }

  /**
   * Earliest offset in `[from, end)` that directly follows a separator, trying
   * separators in priority order. Offsets inside a run of the same separator
   * are skipped. Returns -1 when there is none.
   */
  private separatorBoundary(text: string, from: number, end: number): number {
    for (const sep of this.separators) {
      if (sep === "") continue;
      let at = text.indexOf(sep, Math.max(0, from - sep.length));
      while (at >= 0 && at + sep.length < end) {
        const boundary = at + sep.length;
        if (boundary >= from && !text.startsWith(sep, boundary)) return boundary;
        at = text.indexOf(sep, at + 1);
      }
    }
    return -1;
  }

  private atomize(text: string, span: Span, level: number, limit: number, out: Span[]): void {
    if (span.end - span.start <= limit) {
      out.push(span);
      return;
    }
    const sep = this.separators[level];
    if (sep === "") {
      splitCharacters(text, span, limit, out);
      return;
    }
    const pieces = splitKeepingSeparator(text, span, sep);
    if (pieces.length === 1) {
      this.atomize(text, span, level + 1, limit, out);
      return;
    }
    for (const piece of pieces) {
      if (piece.end - piece.start <= limit) out.push(piece);
      else this.atomize(text, piece, level + 1, limit, out);
    }
  }
}

function splitKeepingSeparator(text: string, span: Span, sep: string): Span[] {
  const pieces: Span[] = [];
  let from = span.start;
  for (;;) {
    const at = text.indexOf(sep, from);
    if (at < 0 || at + sep.length > span.end) break;
    const end = at + sep.length;
    if (end < span.end) {
      pieces.push({ start: from, end });
      from = end;
    } else {
      break;
    }
  }
  pieces.push({ start: from, end: span.end });
  return pieces;
}

function splitCharacters(text: string, span: Span, limit: number, out: Span[]): void {
  let i = span.start;
  while (i < span.end) {
    const width = limit >= 2 && isHighSurrogate(text, i) && i + 1 < span.end ? 2 : 1;
    out.push({ start: i, end: i + width });
    i += width;
  }
}

function isHighSurrogate(text: string, i: number): boolean {
  const c = text.charCodeAt(i);
  return c >= 0xd800 && c <= 0xdbff;
}

function isLowSurrogate(text: string, i: number): boolean {
  const c = text.charCodeAt(i);
  return c >= 0xdc00 && c <= 0xdfff;
}
