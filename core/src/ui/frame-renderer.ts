/**
 * Incremental frame renderer.
 *
 * A prompt draws each iteration into a logical frame: rows of styled runs,
 * each row fingerprinted with a 64-bit hash of its text and style. Finishing
 * the frame diffs it row by row against the previously rendered one and
 * rewrites only rows whose hash changed, then parks the terminal cursor at
 * the position marked during the draw.
 */

import type { Terminal, TerminalSize } from "../terminal/terminal.js";
import { displayWidth } from "../utils/graphemes.js";
import { ansiPieces } from "./ansi.js";
import { RowHasher } from "./hash.js";
import { EMPTY_STYLE, type StyleSheet, type Styled, styleKey, styled } from "./style.js";

/** Size assumed when the terminal cannot report one. */
export const FALLBACK_TERMINAL_SIZE: TerminalSize = { width: 1000, height: 1000 };

export interface Position {
  row: number;
  col: number;
}

interface FrameRow {
  content: Styled[];
  hash: bigint;
}

// --- Frame state ------------------------------------------------------------

class FrameState {
  readonly finishedRows: FrameRow[] = [];
  width = 0;
  cursorMark: Position | null = null;

  private currentText = "";
  private currentStyle: StyleSheet = EMPTY_STYLE;
  private currentLine: Styled[] = [];
  private currentLineWidth = 0;
  private hasher = new RowHasher();

  constructor(readonly terminalSize: TerminalSize) {}

  get height(): number {
    return this.finishedRows.length;
  }

  write(value: Styled): void {
    this.currentStyle = value.style;
    const style = styleKey(value.style);

    for (const piece of ansiPieces(value.content)) {
      if (piece.kind === "escape") {
        this.hasher.update(piece.text).update(style);
        this.currentText += piece.text;
        continue;
      }

      if (piece.text === "\n" || piece.text === "\r\n") {
        this.hasher.update(piece.text).update(style);
        this.finishLine();
        continue;
      }
      if (piece.text === "\r") continue;

      const width = displayWidth(piece.text);
      if (this.currentLineWidth > 0 && width > this.terminalSize.width - this.currentLineWidth) {
        // the grapheme does not fit; it opens the next row and is hashed there
        this.finishLine();
      }

      this.hasher.update(piece.text).update(style);
      this.currentLineWidth += width;
      this.currentText += piece.text;
    }

    this.pushCurrentRun();
  }

  markCursor(offset: number): void {
    let row = this.finishedRows.length;
    let col = this.currentLineWidth + offset;

    if (col >= this.terminalSize.width) {
      col -= this.terminalSize.width;
      row++;
    }

    this.cursorMark = { row, col };
  }

  /** Closes the row in progress, if anything was written to it. */
  finish(): void {
    if (this.hasPendingContent()) this.finishLine();
  }

  /** Replays this frame's rows into a state sized for another terminal. */
  resized(size: TerminalSize): FrameState {
    const next = new FrameState(size);
    for (const row of this.finishedRows) {
      for (const run of row.content) next.write(run);
      next.finishLine();
    }
    for (const run of this.currentLine) next.write(run);
    next.finish();
    return next;
  }

  private hasPendingContent(): boolean {
    return this.currentLine.length > 0 || this.currentText !== "";
  }

  private pushCurrentRun(): void {
    if (this.currentText !== "") {
      this.currentLine.push(styled(this.currentText, this.currentStyle));
      this.currentText = "";
    }
  }

  private finishLine(): void {
    this.pushCurrentRun();

    const content = this.currentLine;
    const hash = this.hasher.digest();
    this.currentLine = [];
    this.hasher = new RowHasher();

    // rows closed by an explicit newline are kept even when blank
    this.finishedRows.push({ content, hash });
    this.width = Math.max(this.width, this.currentLineWidth);
    this.currentLineWidth = 0;
  }
}

// --- Renderer ---------------------------------------------------------------

type RenderState =
  | { kind: "initial" }
  | { kind: "active"; last: FrameState; current: FrameState }
  | { kind: "rendered"; last: FrameState };

function sameSize(a: TerminalSize, b: TerminalSize): boolean {
  return a.width === b.width && a.height === b.height;
}

export class FrameRenderer {
  private state: RenderState = { kind: "initial" };
  private cursorPosition: Position = { row: 0, col: 0 };

  constructor(private readonly terminal: Terminal) {}

  write(text: string): void {
    this.writeStyled(styled(text));
  }

  writeStyled(value: Styled): void {
    if (this.state.kind === "active") {
      this.state.current.write(value);
    }
  }

  /** Remembers the current write position, shifted by `offset` columns, as the cursor target. */
  markCursor(offset = 0): void {
    if (this.state.kind === "active") {
      this.state.current.markCursor(offset);
    }
  }

  startFrame(): void {
    const size = this.refreshTerminalSize();

    switch (this.state.kind) {
      case "initial":
        this.state = { kind: "active", last: new FrameState(size), current: new FrameState(size) };
        break;
      case "rendered":
        this.state = { kind: "active", last: this.state.last, current: new FrameState(size) };
        break;
      case "active":
        break;
    }
  }

  finishCurrentFrame(): void {
    if (this.state.kind !== "active") return;

    const { last, current } = this.state;
    current.finish();

    const rows = Math.max(last.height, current.height);

    this.terminal.cursorHide();
    this.moveCursorTo({ row: 0, col: 0 });

    for (let i = 0; i < rows; i++) {
      const lastRow = last.finishedRows[i];
      const currentRow = current.finishedRows[i];

      if (lastRow && currentRow) {
        if (lastRow.hash !== currentRow.hash) {
          this.writeRow(currentRow);
          this.terminal.clearUntilNewLine();
        }
      } else if (lastRow) {
        this.terminal.clearLine();
      } else if (currentRow) {
        this.writeRow(currentRow);
      }

      this.terminal.write("\r");
      this.cursorPosition.col = 0;
      if (i + 1 < rows) {
        this.terminal.write("\n");
        this.cursorPosition.row++;
      }
    }

    if (current.cursorMark) {
      this.moveCursorTo(current.cursorMark);
    } else {
      this.moveBelow(current.height);
    }

    this.terminal.cursorShow();
    this.terminal.flush();

    this.state = { kind: "rendered", last: current };
  }

  /** Moves below the last rendered frame and restores the cursor. */
  close(): void {
    this.refreshTerminalSize();

    if (this.state.kind !== "initial") {
      this.moveCursorTo({ row: this.state.last.height, col: 0 });
    }

    this.terminal.cursorShow();
    this.terminal.flush();
  }

  private writeRow(row: FrameRow): void {
    for (const run of row.content) {
      this.terminal.writeStyled(run);
    }
  }

  /** Parks the cursor at the start of `row`, scrolling with newlines past the frame's end. */
  private moveBelow(row: number): void {
    while (this.cursorPosition.row < row) {
      this.terminal.write("\n");
      this.cursorPosition.row++;
    }
    this.moveCursorTo({ row, col: 0 });
  }

  private moveCursorTo(position: Position): void {
    const { row, col } = this.cursorPosition;

    if (row > position.row) this.terminal.cursorUp(row - position.row);
    else if (row < position.row) this.terminal.cursorDown(position.row - row);

    if (col > position.col) this.terminal.cursorLeft(col - position.col);
    else if (col < position.col) this.terminal.cursorRight(position.col - col);

    this.cursorPosition = { ...position };
  }

  private readSize(): TerminalSize {
    try {
      return this.terminal.getSize();
    } catch {
      return FALLBACK_TERMINAL_SIZE;
    }
  }

  private refreshTerminalSize(): TerminalSize {
    const size = this.readSize();

    if (size.width < this.cursorPosition.col) {
      this.cursorPosition = {
        row: this.cursorPosition.row + Math.floor(this.cursorPosition.col / size.width),
        col: this.cursorPosition.col % size.width,
      };
    }

    switch (this.state.kind) {
      case "initial":
        break;
      case "active":
        if (!sameSize(this.state.last.terminalSize, size)) {
          this.state.last = this.state.last.resized(size);
        }
        if (!sameSize(this.state.current.terminalSize, size)) {
          this.state.current = this.state.current.resized(size);
        }
        break;
      case "rendered":
        if (!sameSize(this.state.last.terminalSize, size)) {
          this.state = { kind: "rendered", last: this.state.last.resized(size) };
        }
        break;
    }

    return size;
  }
}
