import type { Formatter } from "../../formatter.js";
import type { Backend } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import {
  addDays,
  addMonths,
  type CalendarDate,
  clampDate,
  sameDate,
  type Weekday,
} from "../../utils/date-utils.js";
import { type InvalidResult, runValidators, type Validator } from "../../validator.js";
import { type ActionResult, type PromptCore, redrawIf, type Submission } from "../prompt.js";
import { type DateSelectAction, dateSelectActionFromKey } from "./action.js";

export interface DateSelectPromptInit {
  message: string;
  startingDate: CalendarDate;
  minDate: CalendarDate | null;
  maxDate: CalendarDate | null;
  weekStart: Weekday;
  today: CalendarDate;
  vimMode: boolean;
  helpMessage: string | null;
  validators: readonly Validator<CalendarDate>[];
  formatter: Formatter<CalendarDate>;
}

export class DateSelectPrompt implements PromptCore<DateSelectAction, CalendarDate> {
  readonly message: string;
  private current: CalendarDate;
  private error: InvalidResult | null = null;

  constructor(private readonly init: DateSelectPromptInit) {
    this.message = init.message;
    this.current = init.startingDate;
  }

  mapKey(key: Key): DateSelectAction | null {
    return dateSelectActionFromKey(key, this.init.vimMode);
  }

  handle(action: DateSelectAction): ActionResult {
    const shifted =
      action.kind === "shiftDays"
        ? addDays(this.current, action.days)
        : addMonths(this.current, action.months);
    const next = clampDate(shifted, this.init.minDate, this.init.maxDate);

    const changed = !sameDate(next, this.current);
    this.current = next;
    return redrawIf(changed);
  }

  async submit(): Promise<Submission<CalendarDate>> {
    const validation = await runValidators(this.init.validators, this.current);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer: this.current };
  }

  formatAnswer(answer: CalendarDate): string {
    return this.init.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    backend.renderPrompt(this.message);
    backend.renderCalendar({
      month: this.current.month,
      year: this.current.year,
      weekStart: this.init.weekStart,
      today: this.init.today,
      selected: this.current,
      min: this.init.minDate,
      max: this.init.maxDate,
    });

    if (this.init.helpMessage) {
      backend.renderHelpMessage(this.init.helpMessage);
    }
  }
}
