import { InvalidConfigurationError } from "../../errors.js";
import { defaultDateFormatter, type Formatter } from "../../formatter.js";
import type { PromptIO } from "../../terminal/terminal.js";
import { type CalendarDate, compareDates, today, type Weekday } from "../../utils/date-utils.js";
import type { Validator } from "../../validator.js";
import { type CommonPromptOptions, DEFAULT_VIM_MODE, helpOrDefault, PromptBase } from "../base.js";
import { runPrompt } from "../prompt.js";
import { DateSelectPrompt } from "./prompt.js";

export const DATE_SELECT_HELP_MESSAGE =
  "arrows to move, with ctrl to move months and years, enter to select";
export const DEFAULT_WEEK_START: Weekday = "sun";

export interface DateSelectOptions extends CommonPromptOptions {
  /** Defaults to today. */
  startingDate?: CalendarDate;
  minDate?: CalendarDate | null;
  maxDate?: CalendarDate | null;
  weekStart?: Weekday;
  vimMode?: boolean;
  validators?: readonly Validator<CalendarDate>[];
  formatter?: Formatter<CalendarDate>;
}

/** Calendar date picker. Navigation never leaves [minDate, maxDate]. */
export class DateSelect extends PromptBase<CalendarDate> {
  constructor(
    message: string,
    private readonly config: DateSelectOptions = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<CalendarDate> {
    const { config } = this;
    const now = today();
    const startingDate = config.startingDate ?? now;
    const minDate = config.minDate ?? null;
    const maxDate = config.maxDate ?? null;

    if (minDate && compareDates(minDate, startingDate) > 0) {
      throw new InvalidConfigurationError("Min date can not be greater than starting date");
    }
    if (maxDate && compareDates(maxDate, startingDate) < 0) {
      throw new InvalidConfigurationError("Max date can not be smaller than starting date");
    }

    return (io) =>
      runPrompt(
        new DateSelectPrompt({
          message: this.message,
          startingDate,
          minDate,
          maxDate,
          weekStart: config.weekStart ?? DEFAULT_WEEK_START,
          today: now,
          vimMode: config.vimMode ?? DEFAULT_VIM_MODE,
          helpMessage: helpOrDefault(config.helpMessage, DATE_SELECT_HELP_MESSAGE),
          validators: config.validators ?? [],
          formatter: config.formatter ?? defaultDateFormatter,
        }),
        io,
        this.renderConfig,
      );
  }
}
