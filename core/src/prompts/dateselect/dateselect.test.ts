import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, TerminalIOError } from "../../errors.js";
import { scriptedIO } from "../../testing/scripted-key-reader.js";
import { type Key, KeyModifiers, keys } from "../../ui/key.js";
import { emptyRenderConfig } from "../../ui/render-config.js";
import { type CalendarDate, calendarDate, weekdayOf } from "../../utils/date-utils.js";
import { invalid, valid } from "../../validator.js";
import { DateSelect, type DateSelectOptions } from "./dateselect.js";

const renderConfig = emptyRenderConfig();
const CTRL = KeyModifiers.CONTROL;

function date(config: DateSelectOptions = {}) {
  return new DateSelect("Date?", {
    renderConfig,
    startingDate: calendarDate(2023, 1, 15),
    ...config,
  });
}

function repeat(key: Key, times: number): Key[] {
  return Array.from({ length: times }, () => key);
}

describe("DateSelect", () => {
  it("stops at the min date", async () => {
    const io = scriptedIO([...repeat(keys.left(), 200), keys.submit()]);
    const prompt = date({ minDate: calendarDate(2022, 12, 25) });

    await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2022, 12, 25));
    expect(io.terminal.screen()).toEqual(["? Date? December 25, 2022"]);
  });

  it("stops at the max date", async () => {
    const io = scriptedIO([keys.right(CTRL), keys.submit()]);
    const prompt = date({ maxDate: calendarDate(2023, 1, 20) });

    await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2023, 1, 20));
  });

  it("renders the month grid", async () => {
    const io = scriptedIO([]);

    await expect(date().prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual([
      "? Date?",
      ">     january 2023",
      "> su mo tu we th fr sa",
      "> 25 26 27 28 29 30 31",
      ">  1  2  3  4  5  6  7",
      ">  8  9 10 11 12 13 14",
      "> 15 16 17 18 19 20 21",
      "> 22 23 24 25 26 27 28",
      "> 29 30 31  1  2  3  4",
      "[arrows to move, with ctrl to move months and years, enter to select]",
    ]);
  });

  it("aligns the grid to the week start", async () => {
    const io = scriptedIO([]);

    await expect(date({ weekStart: "mon", helpMessage: null }).prompt(io)).rejects.toThrow(
      TerminalIOError,
    );
    const screen = io.terminal.screen();
    expect(screen[2]).toBe("> mo tu we th fr sa su");
    expect(screen[3]).toBe("> 26 27 28 29 30 31  1");
    expect(screen).toHaveLength(9);
  });

  it("redraws the header after a month change", async () => {
    const io = scriptedIO([keys.right(CTRL)]);

    await expect(date().prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()[1]).toBe(">    february 2023");
  });

  describe("navigation", () => {
    it("moves by days with left and right", async () => {
      const io = scriptedIO([keys.right(), keys.right(), keys.left(), keys.submit()]);
      await expect(date().prompt(io)).resolves.toEqual(calendarDate(2023, 1, 16));
    });

    it("moves by weeks with up, down and tab", async () => {
      const io = scriptedIO([keys.down(), keys.tab(), keys.up(), keys.down(), keys.submit()]);
      await expect(date().prompt(io)).resolves.toEqual(calendarDate(2023, 1, 29));
    });

    it("crosses the year boundary", async () => {
      const io = scriptedIO([keys.up(), keys.submit()]);
      const prompt = date({ startingDate: calendarDate(2023, 1, 3) });

      await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2022, 12, 27));
    });

    it("clamps the day when moving to a shorter month", async () => {
      const io = scriptedIO([keys.right(CTRL), keys.submit()]);
      const prompt = date({ startingDate: calendarDate(2023, 1, 31) });

      await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2023, 2, 28));
      expect(io.terminal.screen()).toEqual(["? Date? February 28, 2023"]);
    });

    it("moves by years with ctrl and up or down", async () => {
      const io = scriptedIO([keys.up(CTRL), keys.submit()]);
      const prompt = date({ startingDate: calendarDate(2024, 2, 29) });

      await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2023, 2, 28));
    });

    it("moves back a month into the previous year", async () => {
      const io = scriptedIO([keys.left(CTRL), keys.down(CTRL), keys.submit()]);
      await expect(date().prompt(io)).resolves.toEqual(calendarDate(2023, 12, 15));
    });

    it("uses h, j, k and l in vim mode", async () => {
      const io = scriptedIO([
        keys.char("l"),
        keys.char("l"),
        keys.char("k"),
        keys.char("j"),
        keys.char("k"),
        keys.char("h"),
        keys.submit(),
      ]);
      await expect(date({ vimMode: true }).prompt(io)).resolves.toEqual(calendarDate(2023, 1, 9));
    });

    it("ignores letters outside vim mode", async () => {
      const io = scriptedIO([keys.char("l"), keys.submit()]);
      await expect(date().prompt(io)).resolves.toEqual(calendarDate(2023, 1, 15));
    });
  });

  it("keeps the prompt open while the validators reject the date", async () => {
    const weekday = (value: CalendarDate) =>
      ["sat", "sun"].includes(weekdayOf(value)) ? invalid("Pick a weekday") : valid();
    const io = scriptedIO([keys.submit(), keys.right(), keys.submit()]);

    await expect(date({ validators: [weekday] }).prompt(io)).resolves.toEqual(
      calendarDate(2023, 1, 16),
    );
  });

  it("shows the validator message", async () => {
    const io = scriptedIO([keys.submit()]);
    const prompt = date({ validators: [() => invalid("Pick a weekday")], helpMessage: null });

    await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()[0]).toBe("# Pick a weekday");
    expect(io.terminal.screen()[1]).toBe("? Date?");
  });

  it("formats the answer with the custom formatter", async () => {
    const io = scriptedIO([keys.submit()]);
    const prompt = date({ formatter: (d) => `${d.year}/${d.month}/${d.day}` });

    await prompt.prompt(io);
    expect(io.terminal.screen()).toEqual(["? Date? 2023/1/15"]);
  });

  describe("configuration", () => {
    it("rejects a min date after the starting date", async () => {
      const io = scriptedIO([keys.submit()]);
      const prompt = date({ minDate: calendarDate(2023, 2, 1) });

      await expect(prompt.prompt(io)).rejects.toThrow(
        "The prompt configuration is invalid: Min date can not be greater than starting date",
      );
      expect(io.terminal.calls).toEqual([]);
      expect(io.closed()).toBe(false);
    });

    it("rejects a max date before the starting date", async () => {
      const io = scriptedIO([keys.submit()]);
      const prompt = date({ maxDate: calendarDate(2023, 1, 1) });

      await expect(prompt.prompt(io)).rejects.toBeInstanceOf(InvalidConfigurationError);
      expect(io.reader.remaining).toBe(1);
    });

    it("accepts bounds equal to the starting date", async () => {
      const io = scriptedIO([keys.left(), keys.right(), keys.submit()]);
      const prompt = date({ minDate: calendarDate(2023, 1, 15), maxDate: calendarDate(2023, 1, 15) });

      await expect(prompt.prompt(io)).resolves.toEqual(calendarDate(2023, 1, 15));
    });
  });
});
