import type { Align } from "./schema/index.js";

/**
 * Length of a string in code points
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Append-only output accumulator for one expansion
 */
export class OutputBuffer {
  private readonly chunks: string[] = [];

  /**
   * Append raw text
   */
  write(text: string): void {
    if (text.length > 0) {
      this.chunks.push(text);
    }
  }

  /**
   * Append text padded to a minimum width. Never truncates.
   *
   * Centering puts the odd leftover fill character on the right.
   */
  writeAligned(text: string, align: Align, width: number, fillChar: string = " "): void {
    const length = codePointLength(text);
    if (align === "none" || length >= width) {
      this.write(text);
      return;
    }

    const padding = width - length;
    switch (align) {
      case "right":
        this.write(fillChar.repeat(padding));
        this.write(text);
        break;
      case "left":
        this.write(text);
        this.write(fillChar.repeat(padding));
        break;
      case "center": {
        const before = Math.floor(padding / 2);
        this.write(fillChar.repeat(before));
        this.write(text);
        this.write(fillChar.repeat(padding - before));
        break;
      }
      case "padSign":
        if (text.startsWith("-") || text.startsWith("+")) {
          this.write(text.slice(0, 1));
          this.writeAligned(text.slice(1), "right", width - 1, fillChar);
        } else {
          this.writeAligned(text, "right", width, fillChar);
        }
        break;
    }
  }

  toString(): string {
    return this.chunks.join("");
  }
}
