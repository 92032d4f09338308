/**
 * Folded Text
 *
 * Lowercased working copy of a string that remembers where each folded
 * code unit came from. Matching runs against the folded copy; spans are
 * translated back so highlights point into the original-cased text even
 * when lowercasing changes the length (e.g. "İ" folds to "i̇").
 *
 * @module fts/FoldedText
 */

/**
 * A span in the original text, in UTF-16 code units.
 */
export interface SourceSpan {
  offset: number;
  length: number;
}

export class FoldedText {
  /**
   * Per folded code unit: start and end of the source range it was produced from.
   * Null while folding preserved every code point's length (identity mapping).
   */
  private readonly starts: number[] | null;
  private readonly ends: number[] | null;

  private constructor(
    readonly source: string,
    readonly folded: string,
    starts: number[] | null,
    ends: number[] | null
  ) {
    this.starts = starts;
    this.ends = ends;
  }

  /**
   * Fold a string code point by code point.
   * Folding per code point keeps terms and field text consistent: a term folds
   * the same way whether it stands alone or sits inside a longer text.
   */
  static of(source: string): FoldedText {
    let folded = '';
    let starts: number[] | null = null;
    let ends: number[] | null = null;
    let sourceIndex = 0;

    for (const char of source) {
      const lower = char.toLowerCase();

      if (starts === null && lower.length !== char.length) {
        // First length change: materialize the identity mapping so far
        starts = [];
        ends = [];
        for (let i = 0; i < folded.length; i++) {
          starts.push(i);
          ends.push(i + 1);
        }
      }

      if (starts !== null && ends !== null) {
        if (lower.length === char.length) {
          for (let j = 0; j < lower.length; j++) {
            starts.push(sourceIndex + j);
            ends.push(sourceIndex + j + 1);
          }
        } else {
          for (let j = 0; j < lower.length; j++) {
            starts.push(sourceIndex);
            ends.push(sourceIndex + char.length);
          }
        }
      }

      folded += lower;
      sourceIndex += char.length;
    }

    return new FoldedText(source, folded, starts, ends);
  }

  /**
   * Translate a non-empty span of the folded copy into the source text.
   */
  toSourceSpan(start: number, length: number): SourceSpan {
    if (this.starts === null || this.ends === null) {
      return { offset: start, length };
    }
    const offset = this.starts[start];
    const end = this.ends[start + length - 1];
    return { offset, length: end - offset };
  }
}
