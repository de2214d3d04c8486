/**
 * Prompt-facing drawing vocabulary on top of the frame renderer.
 *
 * Prompts describe what to show (prompt line, options, calendar, error,
 * help) and the backend decides glyphs and styles from the render config.
 */

import type { Input } from "../input/input.js";
import {
  addDays,
  type CalendarDate,
  calendarStartDate,
  compareDates,
  monthName,
  nextWeekday,
  sameDate,
  type Weekday,
} from "../utils/date-utils.js";
import { displayWidth } from "../utils/graphemes.js";
import type { Page } from "../utils/paginate.js";
import type { FrameRenderer } from "./frame-renderer.js";
import type { IndexPrefix, RenderConfig } from "./render-config.js";
import { EMPTY_STYLE, type StyleSheet, type Styled, styled, withStyle } from "./style.js";

/** An option as shown in a list: its original index and display text. */
export interface OptionRow {
  index: number;
  label: string;
}

export interface CalendarView {
  month: number;
  year: number;
  weekStart: Weekday;
  today: CalendarDate;
  selected: CalendarDate;
  min: CalendarDate | null;
  max: CalendarDate | null;
}

const CALENDAR_HEADER_WIDTH = 20;
const CALENDAR_WEEKS = 6;
const DAYS_PER_WEEK = 7;

function centered(text: string, width: number): string {
  const total = Math.max(0, width - text.length);
  const left = Math.floor(total / 2);
  return " ".repeat(left) + text + " ".repeat(total - left);
}

function indexPrefix(kind: IndexPrefix, position: number, width: number): string | null {
  switch (kind) {
    case "none":
      return null;
    case "simple":
      return `${position})`;
    case "spacePadded":
      return `${String(position).padStart(width, " ")})`;
    case "zeroPadded":
      return `${String(position).padStart(width, "0")})`;
  }
}

export class Backend {
  constructor(
    private readonly renderer: FrameRenderer,
    readonly config: RenderConfig,
  ) {}

  // --- Frame lifecycle ---

  frameSetup(): void {
    this.renderer.startFrame();
  }

  frameFinish(): void {
    this.renderer.finishCurrentFrame();
  }

  // --- Common lines ---

  renderCanceledPrompt(message: string): void {
    this.printPrompt(message);
    this.write(" ");
    this.writeStyled(this.config.canceledPromptIndicator);
    this.newLine();
  }

  renderPromptWithAnswer(message: string, answer: string): void {
    this.printPromptWithPrefix(this.config.answeredPromptPrefix, message);
    this.write(" ");
    this.writeStyled(styled(answer, this.config.answer));
    this.newLine();
  }

  /** Null renders the config's default error message. */
  renderErrorMessage(message: string | null): void {
    const { errorMessage } = this.config;
    this.writeStyled(errorMessage.prefix);
    this.writeStyled(styled(" ", errorMessage.separator));
    this.writeStyled(styled(message ?? errorMessage.defaultMessage, errorMessage.message));
    this.newLine();
  }

  renderHelpMessage(help: string): void {
    this.writeStyled(styled(`[${help}]`, this.config.helpMessage));
    this.newLine();
  }

  // --- Prompt lines ---

  renderPrompt(message: string): void {
    this.printPrompt(message);
    this.newLine();
  }

  renderPromptWithInput(message: string, defaultValue: string | null, input: Input): void {
    this.printPrompt(message);

    if (defaultValue !== null) {
      this.write(" ");
      this.writeStyled(styled(`(${defaultValue})`, this.config.defaultValue));
    }

    const atEnd = input.cursor === input.graphemeLength;
    this.printInput(input.value, input.placeholder, atEnd, input.preCursor());
    this.newLine();
  }

  /** Prompt line of the list prompts; the filter input is shown only when enabled. */
  renderPromptWithFilter(message: string, filter: Input | null): void {
    if (filter) {
      this.renderPromptWithInput(message, null, filter);
    } else {
      this.renderPrompt(message);
    }
  }

  /** One mask glyph per grapheme, cursor kept at the same grapheme index. */
  renderPromptWithMaskedInput(message: string, input: Input): void {
    const mask = this.config.passwordMask;
    this.printPrompt(message);
    this.printInput(
      mask.repeat(input.graphemeLength),
      null,
      input.cursor === input.graphemeLength,
      mask.repeat(input.cursor),
    );
    this.newLine();
  }

  renderEditorPrompt(message: string, editorName: string): void {
    this.printPrompt(message);
    this.write(" ");
    this.writeStyled(
      styled(`[(e) to open ${editorName}, (enter) to submit]`, this.config.editorPrompt),
    );
    this.newLine();
  }

  // --- Lists ---

  renderSuggestions(page: Page<string>): void {
    page.content.forEach((suggestion, idx) => {
      this.printOptionPrefix(idx, page);
      this.write(" ");
      this.printOptionValue(idx, suggestion, page);
      this.newLine();
    });
  }

  /** `optionCount` is the unfiltered count; index prefixes keep its width while filtering. */
  renderOptions(page: Page<OptionRow>, optionCount: number): void {
    page.content.forEach((option, idx) => {
      this.printOptionPrefix(idx, page);
      this.write(" ");
      if (this.printOptionIndexPrefix(option.index, optionCount)) {
        this.write(" ");
      }
      this.printOptionValue(idx, option.label, page);
      this.newLine();
    });
  }

  renderMultiOptions(
    page: Page<OptionRow>,
    checked: ReadonlySet<number>,
    optionCount: number,
  ): void {
    this.printMarkedOptions(page, optionCount, (index) =>
      checked.has(index) ? this.config.selectedCheckbox : this.config.unselectedCheckbox,
    );
  }

  /** Options with a positive count show it in brackets, styled like a checked box. */
  renderCountedOptions(
    page: Page<OptionRow>,
    counts: ReadonlyMap<number, number>,
    optionCount: number,
  ): void {
    this.printMarkedOptions(page, optionCount, (index) => {
      const count = counts.get(index) ?? 0;
      if (count === 0) return this.config.unselectedCheckbox;
      return styled(`[${count}]`, this.config.selectedCheckbox.style);
    });
  }

  // --- Calendar ---

  renderCalendar(view: CalendarView): void {
    const { calendar } = this.config;
    const writePrefix = () => {
      this.writeStyled(calendar.prefix);
      this.write(" ");
    };

    const header = `${monthName(view.month).toLowerCase()} ${view.year}`;
    writePrefix();
    this.writeStyled(styled(centered(header, CALENDAR_HEADER_WIDTH), calendar.header));
    this.newLine();

    const weekDays: string[] = [];
    let weekday = view.weekStart;
    for (let i = 0; i < DAYS_PER_WEEK; i++) {
      weekDays.push(weekday.slice(0, 2));
      weekday = nextWeekday(weekday);
    }
    writePrefix();
    this.writeStyled(styled(weekDays.join(" "), calendar.weekHeader));
    this.newLine();

    let date = calendarStartDate(view.year, view.month, view.weekStart);
    for (let week = 0; week < CALENDAR_WEEKS; week++) {
      writePrefix();

      for (let i = 0; i < DAYS_PER_WEEK; i++) {
        if (i > 0) this.write(" ");

        let style: StyleSheet = EMPTY_STYLE;
        if (sameDate(date, view.selected)) {
          this.renderer.markCursor(date.day < 10 ? 1 : 0);
          style = calendar.selectedDate ?? EMPTY_STYLE;
        } else if (sameDate(date, view.today)) {
          style = calendar.todayDate;
        } else if (date.month !== view.month) {
          style = calendar.differentMonthDate;
        }

        if (view.min && compareDates(date, view.min) < 0) style = calendar.unavailableDate;
        if (view.max && compareDates(date, view.max) > 0) style = calendar.unavailableDate;

        this.writeStyled(styled(String(date.day).padStart(2, " "), style));
        date = addDays(date, 1);
      }

      this.newLine();
    }
  }

  // --- Primitives ---

  newLine(): void {
    this.write("\r\n");
  }

  private write(text: string): void {
    this.renderer.write(text);
  }

  private writeStyled(value: Styled): void {
    this.renderer.writeStyled(value);
  }

  private printPromptWithPrefix(prefix: Styled, message: string): void {
    this.writeStyled(prefix);
    this.write(" ");
    this.writeStyled(styled(message, this.config.prompt));
  }

  private printPrompt(message: string): void {
    this.printPromptWithPrefix(this.config.promptPrefix, message);
  }

  private printInput(
    content: string,
    placeholder: string | null,
    cursorAtEnd: boolean,
    preCursor: string,
  ): void {
    this.write(" ");
    this.renderer.markCursor(displayWidth(preCursor));

    if (content === "") {
      if (placeholder) {
        this.writeStyled(styled(placeholder, this.config.placeholder));
      }
    } else {
      this.writeStyled(styled(content, this.config.textInput));
    }

    // keeps the cursor on this row instead of the start of the next one
    if (cursorAtEnd) {
      this.write(" ");
    }
  }

  private printOptionPrefix<T>(relativeIndex: number, page: Page<T>): void {
    let prefix = styled(" ");
    if (page.cursor === relativeIndex) {
      prefix = this.config.highlightedOptionPrefix;
    } else if (relativeIndex === 0 && !page.first) {
      prefix = this.config.scrollUpPrefix;
    } else if (relativeIndex + 1 === page.content.length && !page.last) {
      prefix = this.config.scrollDownPrefix;
    }
    this.writeStyled(prefix);
  }

  private printOptionValue<T>(relativeIndex: number, label: string, page: Page<T>): void {
    const style =
      this.config.selectedOption && page.cursor === relativeIndex
        ? this.config.selectedOption
        : this.config.option;
    this.writeStyled(styled(label, style));
  }

  private printMarkedOptions(
    page: Page<OptionRow>,
    optionCount: number,
    markFor: (index: number) => Styled,
  ): void {
    page.content.forEach((option, idx) => {
      this.printOptionPrefix(idx, page);
      this.write(" ");
      if (this.printOptionIndexPrefix(option.index, optionCount)) {
        this.write(" ");
      }

      let mark = markFor(option.index);
      if (this.config.selectedOption && page.cursor === idx) {
        mark = withStyle(mark, this.config.selectedOption);
      }
      this.writeStyled(mark);
      this.write(" ");

      this.printOptionValue(idx, option.label, page);
      this.newLine();
    });
  }

  /** Returns true when a prefix was written. */
  private printOptionIndexPrefix(index: number, optionCount: number): boolean {
    const width = String(optionCount).length;
    const content = indexPrefix(this.config.optionIndexPrefix, index + 1, width);
    if (content === null) return false;
    this.writeStyled(styled(content, this.config.option));
    return true;
  }
}
